import type { TokenUsage } from "@sessionscope/contracts";

export interface PricingTier {
  name: string;
  /** USD per million input tokens. */
  inRate: number;
  /** USD per million output tokens. */
  outRate: number;
}

export const PRICING_TIERS = {
  opusNew: { name: "opus-4.5+", inRate: 5, outRate: 25 },
  opusOld: { name: "opus", inRate: 15, outRate: 75 },
  sonnet: { name: "sonnet", inRate: 3, outRate: 15 },
  haikuNew: { name: "haiku-4.5+", inRate: 1, outRate: 5 },
  haiku35: { name: "haiku-3.5", inRate: 0.8, outRate: 4 },
  haikuOld: { name: "haiku", inRate: 0.25, outRate: 1.25 },
} as const satisfies Record<string, PricingTier>;

export const DEFAULT_PRICING_TIER: PricingTier = PRICING_TIERS.sonnet;

const CACHE_READ_MULTIPLIER = 0.1;
const CACHE_WRITE_MULTIPLIER = 1.25;
const PER_MILLION = 1_000_000;

export interface ModelVersion {
  major: number;
  minor: number;
}

// numbers of three or more digits are date stamps, never version components
function versionNumber(text: string | undefined): number | null {
  if (text === undefined || !/^\d+$/.test(text)) return null;
  const value = Number(text);
  return value < 100 ? value : null;
}

function parseVersionAfter(rest: string): ModelVersion | null {
  if (!rest.startsWith("-")) return null;
  const parts = rest.slice(1).split("-");
  const major = versionNumber(parts[0]);
  if (major === null) return null;
  return { major, minor: versionNumber(parts[1]) ?? 0 };
}

function parseVersionBefore(prefix: string): ModelVersion | null {
  const trimmed = prefix.replace(/-+$/, "");
  if (!trimmed) return null;
  const parts = trimmed.split("-");
  const last = versionNumber(parts[parts.length - 1]);
  if (last === null) return null;
  const previous = parts.length >= 2 ? versionNumber(parts[parts.length - 2]) : null;
  if (previous !== null) return { major: previous, minor: last };
  return { major: last, minor: 0 };
}

/**
 * Version attached to a model family, read either after the family name
 * ("claude-opus-4-5-20251101") or before it ("claude-3-5-sonnet-20241022").
 * Unknown versions read as 0.0.
 */
export function extractModelVersion(model: string, family: string): ModelVersion {
  const lower = model.toLowerCase();
  const index = lower.indexOf(family);
  if (index < 0) return { major: 0, minor: 0 };
  return (
    parseVersionAfter(lower.slice(index + family.length)) ??
    parseVersionBefore(lower.slice(0, index)) ?? { major: 0, minor: 0 }
  );
}

function atLeast(version: ModelVersion, major: number, minor: number): boolean {
  return version.major > major || (version.major === major && version.minor >= minor);
}

export function classifyModel(model: string): PricingTier {
  const lower = model.toLowerCase();
  if (lower.includes("opus")) {
    return atLeast(extractModelVersion(lower, "opus"), 4, 5) ? PRICING_TIERS.opusNew : PRICING_TIERS.opusOld;
  }
  if (lower.includes("sonnet")) {
    return PRICING_TIERS.sonnet;
  }
  if (lower.includes("haiku")) {
    const version = extractModelVersion(lower, "haiku");
    if (atLeast(version, 4, 5)) return PRICING_TIERS.haikuNew;
    if (version.major === 3 && version.minor === 5) return PRICING_TIERS.haiku35;
    return PRICING_TIERS.haikuOld;
  }
  return DEFAULT_PRICING_TIER;
}

/** USD cost of `usage`, where inputTokens excludes cached input. */
export function modelCost(model: string, usage: Partial<TokenUsage>): number {
  const tier = classifyModel(model);
  const input = usage.inputTokens ?? 0;
  const output = usage.outputTokens ?? 0;
  const cacheRead = usage.cacheReadTokens ?? 0;
  const cacheWrite = usage.cacheWriteTokens ?? 0;
  return (
    (input * tier.inRate +
      cacheRead * tier.inRate * CACHE_READ_MULTIPLIER +
      cacheWrite * tier.inRate * CACHE_WRITE_MULTIPLIER +
      output * tier.outRate) /
    PER_MILLION
  );
}
