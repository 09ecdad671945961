import type { AdapterConfig, AdapterId, AppConfig } from "@sessionscope/contracts";
import { DEFAULT_MAX_LINE_BYTES, DEFAULT_SCANNER_BUFFER_BYTES } from "./jsonl/bufferPool.js";

export const DEFAULT_ADAPTER_ROOTS: Record<AdapterId, AdapterConfig> = {
  codex: { enabled: true, root: "~/.codex/sessions" },
  "claude-code": { enabled: true, root: "~/.claude/projects" },
  "gemini-cli": { enabled: true, root: "~/.gemini/tmp" },
  "pi-agent": { enabled: true, root: "~/.pi/agent/sessions" },
};

export const DEFAULT_CONFIG: AppConfig = {
  adapters: DEFAULT_ADAPTER_ROOTS,
  reader: {
    headLines: 20,
    tailBytes: 16 * 1024,
    scannerBufferBytes: DEFAULT_SCANNER_BUFFER_BYTES,
    maxLineBytes: DEFAULT_MAX_LINE_BYTES,
  },
  cache: {
    metadataMaxEntries: 0,
  },
  scan: {
    parseConcurrency: 0,
    rescanLimit: 2000,
    liveWindowMs: 120_000,
  },
  tolerance: {
    malformedLines: 5,
    perLines: 1000,
  },
  titles: {
    maxLength: 50,
  },
};
