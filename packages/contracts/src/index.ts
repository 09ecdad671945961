export type AdapterId = "codex" | "claude-code" | "gemini-cli" | "pi-agent";

export type AdapterCapability = "sessions" | "messages" | "usage" | "watch";
export type MessageRole = "user" | "assistant" | "system";
export type SessionCategory = "interactive" | "cron" | "system";
export type SearchBlockType = "text" | "tool_use" | "tool_result" | "thinking";

export const ADAPTER_IDS: readonly AdapterId[] = ["codex", "claude-code", "gemini-cli", "pi-agent"];

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
}

export interface ToolUse {
  id: string;
  name: string;
  /** Arguments as recorded by the tool, serialized to text. */
  input: string;
  /** Empty until a matching tool result has been attached. */
  output: string;
  isError: boolean;
}

export interface ThinkingBlock {
  content: string;
  timestampMs: number | null;
}

export interface Message {
  id: string;
  role: MessageRole;
  content: string;
  timestampMs: number | null;
  model: string;
  toolUses: ToolUse[];
  thinkingBlocks: ThinkingBlock[];
  usage: TokenUsage | null;
}

export interface Session {
  id: string;
  adapterId: AdapterId;
  adapterName: string;
  adapterIcon: string;
  title: string;
  projectPath: string;
  startTimeMs: number;
  lastUpdatedMs: number;
  messageCount: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
  estCostUsd: number;
  primaryModel: string;
  category: SessionCategory;
  cronJobName: string;
  sourceChannel: string;
  filePath: string;
  sizeBytes: number;
  isLive: boolean;
}

export interface SessionUsage extends TokenUsage {
  sessionId: string;
  messageCount: number;
  totalTokens: number;
  estCostUsd: number;
}

export interface SessionFileSummary {
  path: string;
  sessionId: string;
  startTimeMs: number | null;
  lastUpdatedMs: number | null;
  cwd: string;
  messageCount: number;
  usage: TokenUsage;
  estCostUsd: number;
  primaryModel: string;
  firstUserMessage: string;
  malformedLines: number;
}

export interface SearchOptions {
  regex?: boolean;
  caseSensitive?: boolean;
  maxResults?: number;
}

export interface ContentMatch {
  blockType: SearchBlockType;
  /** 1-based line within the searched block. */
  lineNo: number;
  colStart: number;
  colEnd: number;
  line: string;
}

export interface MessageMatch {
  messageIndex: number;
  messageId: string;
  role: MessageRole;
  matches: ContentMatch[];
}

export interface AdapterConfig {
  enabled: boolean;
  root: string;
}

export interface ReaderConfig {
  headLines: number;
  tailBytes: number;
  scannerBufferBytes: number;
  maxLineBytes: number;
}

export interface CacheConfig {
  /** 0 keeps every entry. */
  metadataMaxEntries: number;
}

export interface ScanConfig {
  /** 0 sizes the pool to the available cores. */
  parseConcurrency: number;
  rescanLimit: number;
  liveWindowMs: number;
}

export interface ToleranceConfig {
  malformedLines: number;
  perLines: number;
}

export interface TitleConfig {
  maxLength: number;
}

export interface AppConfig {
  adapters: Record<AdapterId, AdapterConfig>;
  reader: ReaderConfig;
  cache: CacheConfig;
  scan: ScanConfig;
  tolerance: ToleranceConfig;
  titles: TitleConfig;
}
