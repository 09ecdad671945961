import { ADAPTER_IDS, type AdapterId, type AppConfig } from "@sessionscope/contracts";
import { DEFAULT_CONFIG } from "../defaults.js";
import { NotFoundError } from "../errors.js";
import { ScannerBufferPool, sharedScannerBufferPool } from "../jsonl/bufferPool.js";
import { throwIfCancelled } from "../cancellation.js";
import { ClaudeCodeAdapter } from "./claudeCode.js";
import { CodexAdapter } from "./codex.js";
import { GeminiCliAdapter } from "./geminiCli.js";
import { PiAgentAdapter } from "./piAgent.js";
import type { AdapterCallOptions, AdapterOptions, SessionAdapter } from "./types.js";

type AdapterFactory = (options: AdapterOptions) => SessionAdapter;

const FACTORIES: Record<AdapterId, AdapterFactory> = {
  codex: (options) => new CodexAdapter(options),
  "claude-code": (options) => new ClaudeCodeAdapter(options),
  "gemini-cli": (options) => new GeminiCliAdapter(options),
  "pi-agent": (options) => new PiAgentAdapter(options),
};

export type SharedAdapterOptions = Omit<AdapterOptions, "root" | "config">;

/** One adapter per enabled entry of `config.adapters`, sharing a scanner pool. */
export function createAdapters(config: AppConfig = DEFAULT_CONFIG, options: SharedAdapterOptions = {}): SessionAdapter[] {
  const bufferPool =
    options.bufferPool ??
    (config.reader.scannerBufferBytes === sharedScannerBufferPool.bufferBytes
      ? sharedScannerBufferPool
      : new ScannerBufferPool(config.reader.scannerBufferBytes));
  return ADAPTER_IDS.filter((id) => config.adapters[id].enabled).map((id) =>
    FACTORIES[id]({ ...options, config, bufferPool }),
  );
}

/** Adapters that have at least one session for the project, in registry order. */
export async function detectAdapters(
  adapters: readonly SessionAdapter[],
  projectPath: string,
  options: AdapterCallOptions = {},
): Promise<SessionAdapter[]> {
  const found = await Promise.all(adapters.map((adapter) => adapter.detect(projectPath, options)));
  throwIfCancelled(options.signal);
  return adapters.filter((_, index) => found[index] === true);
}

export class AdapterRegistry {
  private readonly adapters: SessionAdapter[];

  constructor(adapters?: SessionAdapter[]) {
    this.adapters = adapters ?? createAdapters();
  }

  static fromConfig(config: AppConfig, options: SharedAdapterOptions = {}): AdapterRegistry {
    return new AdapterRegistry(createAdapters(config, options));
  }

  list(): readonly SessionAdapter[] {
    return this.adapters;
  }

  byId(id: string): SessionAdapter | undefined {
    return this.adapters.find((adapter) => adapter.id === id);
  }

  require(id: string): SessionAdapter {
    const adapter = this.byId(id);
    if (!adapter) throw new NotFoundError(`no enabled adapter named ${id}`);
    return adapter;
  }

  detect(projectPath: string, options: AdapterCallOptions = {}): Promise<SessionAdapter[]> {
    return detectAdapters(this.adapters, projectPath, options);
  }
}
