export * from "./errors.js";
export { silentLogger, type CoreLogger } from "./logger.js";
export { Semaphore, defaultParseConcurrency } from "./semaphore.js";
export { throwIfCancelled } from "./cancellation.js";
export { DEFAULT_ADAPTER_ROOTS, DEFAULT_CONFIG } from "./defaults.js";
export {
  DEFAULT_CONFIG_PATH,
  configInputFromRecord,
  loadConfig,
  mergeConfig,
  parseConfigToml,
  saveConfig,
  type PartialAppConfigInput,
} from "./config.js";
export {
  type BufferPool,
  DEFAULT_MAX_LINE_BYTES,
  DEFAULT_SCANNER_BUFFER_BYTES,
  ScannerBufferPool,
  UnpooledBuffers,
  sharedScannerBufferPool,
} from "./jsonl/bufferPool.js";
export {
  HeadReader,
  IncrementalReader,
  JsonlReader,
  TailReader,
  collectLines,
  withReader,
  type ReaderOptions,
} from "./jsonl/readers.js";
export {
  DEFAULT_PRICING_TIER,
  PRICING_TIERS,
  classifyModel,
  extractModelVersion,
  modelCost,
  type ModelVersion,
  type PricingTier,
} from "./pricing.js";
export { addUsage, emptyUsage, totalTokens } from "./metrics.js";
export { MetadataCache, fileChanged, type FileStamp, type MetaCacheEntry } from "./cache/metaCache.js";
export { DirectoryListingCache } from "./cache/dirCache.js";
export { listSessionFiles, type ListedFile, type ListingOptions } from "./discovery.js";
export { ResolvedProjectPath, cleanPath, resolveSymlinks } from "./projectPath.js";
export { SessionIndex } from "./sessionIndex.js";
export { DEFAULT_MAX_SEARCH_RESULTS, compileSearchPattern, searchMessageList } from "./search.js";
export { extractSessionOrigin, sessionTitle, truncateTitle } from "./adapters/titles.js";
export type { AdapterCallOptions, AdapterOptions, SessionAdapter } from "./adapters/types.js";
export { FileSessionAdapter, compareSessions } from "./adapters/base.js";
export { CodexAdapter } from "./adapters/codex.js";
export { ClaudeCodeAdapter, encodeProjectDir } from "./adapters/claudeCode.js";
export { GeminiCliAdapter, projectHash } from "./adapters/geminiCli.js";
export { PiAgentAdapter, projectDirName } from "./adapters/piAgent.js";
export { AdapterRegistry, createAdapters, detectAdapters, type SharedAdapterOptions } from "./adapters/registry.js";
