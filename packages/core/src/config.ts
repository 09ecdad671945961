import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import {
  ADAPTER_IDS,
  type AdapterConfig,
  type AdapterId,
  type AppConfig,
  type CacheConfig,
  type ReaderConfig,
  type ScanConfig,
  type TitleConfig,
  type ToleranceConfig,
} from "@sessionscope/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { isMissingFileError, toFsError } from "./errors.js";
import type { CoreLogger } from "./logger.js";
import { asRecord } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".sessionscope", "config.toml");

type Loose<T> = { [K in keyof T]?: unknown };

export interface PartialAppConfigInput {
  adapters?: Partial<Record<AdapterId, Loose<AdapterConfig>>>;
  reader?: Loose<ReaderConfig>;
  cache?: Loose<CacheConfig>;
  scan?: Loose<ScanConfig>;
  tolerance?: Loose<ToleranceConfig>;
  titles?: Loose<TitleConfig>;
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonNegativeIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return Math.round(numeric);
}

function mergeAdapter(id: AdapterId, input?: Loose<AdapterConfig>): AdapterConfig {
  const defaults = DEFAULT_CONFIG.adapters[id];
  const root = typeof input?.root === "string" && input.root.trim() ? input.root.trim() : defaults.root;
  return {
    enabled: typeof input?.enabled === "boolean" ? input.enabled : defaults.enabled,
    root,
  };
}

function mergeAdapters(input?: PartialAppConfigInput["adapters"]): Record<AdapterId, AdapterConfig> {
  return {
    codex: mergeAdapter("codex", input?.codex),
    "claude-code": mergeAdapter("claude-code", input?.["claude-code"]),
    "gemini-cli": mergeAdapter("gemini-cli", input?.["gemini-cli"]),
    "pi-agent": mergeAdapter("pi-agent", input?.["pi-agent"]),
  };
}

function mergeReader(input?: Loose<ReaderConfig>): ReaderConfig {
  const defaults = DEFAULT_CONFIG.reader;
  const scannerBufferBytes = positiveIntOrDefault(input?.scannerBufferBytes, defaults.scannerBufferBytes);
  return {
    headLines: positiveIntOrDefault(input?.headLines, defaults.headLines),
    tailBytes: positiveIntOrDefault(input?.tailBytes, defaults.tailBytes),
    scannerBufferBytes,
    maxLineBytes: Math.max(scannerBufferBytes, positiveIntOrDefault(input?.maxLineBytes, defaults.maxLineBytes)),
  };
}

function mergeCache(input?: Loose<CacheConfig>): CacheConfig {
  return {
    metadataMaxEntries: nonNegativeIntOrDefault(input?.metadataMaxEntries, DEFAULT_CONFIG.cache.metadataMaxEntries),
  };
}

function mergeScan(input?: Loose<ScanConfig>): ScanConfig {
  const defaults = DEFAULT_CONFIG.scan;
  return {
    parseConcurrency: nonNegativeIntOrDefault(input?.parseConcurrency, defaults.parseConcurrency),
    rescanLimit: positiveIntOrDefault(input?.rescanLimit, defaults.rescanLimit),
    liveWindowMs: positiveIntOrDefault(input?.liveWindowMs, defaults.liveWindowMs),
  };
}

function mergeTolerance(input?: Loose<ToleranceConfig>): ToleranceConfig {
  const defaults = DEFAULT_CONFIG.tolerance;
  return {
    malformedLines: nonNegativeIntOrDefault(input?.malformedLines, defaults.malformedLines),
    perLines: positiveIntOrDefault(input?.perLines, defaults.perLines),
  };
}

function mergeTitles(input?: Loose<TitleConfig>): TitleConfig {
  return {
    maxLength: Math.max(4, positiveIntOrDefault(input?.maxLength, DEFAULT_CONFIG.titles.maxLength)),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    adapters: mergeAdapters(input?.adapters),
    reader: mergeReader(input?.reader),
    cache: mergeCache(input?.cache),
    scan: mergeScan(input?.scan),
    tolerance: mergeTolerance(input?.tolerance),
    titles: mergeTitles(input?.titles),
  };
}

/** Narrows a plain nested object into the partial shape mergeConfig accepts; unknown keys are ignored. */
export function configInputFromRecord(parsed: Record<string, unknown>): PartialAppConfigInput {
  const adaptersRecord = asRecord(parsed.adapters);
  const adapters: PartialAppConfigInput["adapters"] = {};
  for (const id of ADAPTER_IDS) {
    adapters[id] = asRecord(adaptersRecord[id]);
  }
  return {
    adapters,
    reader: asRecord(parsed.reader),
    cache: asRecord(parsed.cache),
    scan: asRecord(parsed.scan),
    tolerance: asRecord(parsed.tolerance),
    titles: asRecord(parsed.titles),
  };
}

export function parseConfigToml(raw: string): PartialAppConfigInput {
  return configInputFromRecord(TOML.parse(raw));
}

/** Missing files yield the defaults; unreadable or invalid ones are logged and yield the defaults too. */
export async function loadConfig(configPath = DEFAULT_CONFIG_PATH, logger?: CoreLogger): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    if (!isMissingFileError(error)) {
      logger?.warn("config unreadable, using defaults", { path: configPath, error: toFsError(error, "read", configPath).message });
    }
    return mergeConfig();
  }
  try {
    return mergeConfig(parseConfigToml(raw));
  } catch (error) {
    logger?.warn("config is not valid TOML, using defaults", {
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return mergeConfig();
  }
}

function toTomlMap(config: AppConfig): JsonMap {
  const adapters: JsonMap = {};
  for (const id of ADAPTER_IDS) {
    const adapter = config.adapters[id];
    adapters[id] = { enabled: adapter.enabled, root: adapter.root };
  }
  const { reader, cache, scan, tolerance, titles } = config;
  return {
    adapters,
    reader: {
      headLines: reader.headLines,
      tailBytes: reader.tailBytes,
      scannerBufferBytes: reader.scannerBufferBytes,
      maxLineBytes: reader.maxLineBytes,
    },
    cache: { metadataMaxEntries: cache.metadataMaxEntries },
    scan: { parseConcurrency: scan.parseConcurrency, rescanLimit: scan.rescanLimit, liveWindowMs: scan.liveWindowMs },
    tolerance: { malformedLines: tolerance.malformedLines, perLines: tolerance.perLines },
    titles: { maxLength: titles.maxLength },
  };
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(toTomlMap(config));
  await writeFile(configPath, content, "utf8");
}
