import type { TokenUsage } from "@sessionscope/contracts";
import { asRecord, stringField, tokenCount } from "./utils.js";

export function emptyUsage(): TokenUsage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    cacheReadTokens: 0,
    cacheWriteTokens: 0,
  };
}

export function addUsage(target: TokenUsage, delta: TokenUsage): void {
  target.inputTokens += delta.inputTokens;
  target.outputTokens += delta.outputTokens;
  target.cacheReadTokens += delta.cacheReadTokens;
  target.cacheWriteTokens += delta.cacheWriteTokens;
}

export function totalTokens(usage: TokenUsage): number {
  return usage.inputTokens + usage.outputTokens + usage.cacheReadTokens + usage.cacheWriteTokens;
}

/** Anthropic-style `usage` object: input excludes cache reads and writes. */
export function usageFromAnthropicRecord(value: unknown): TokenUsage {
  const record = asRecord(value);
  const cacheCreation = asRecord(record.cache_creation);
  const cacheWriteFromBreakdown =
    tokenCount(cacheCreation.ephemeral_5m_input_tokens) + tokenCount(cacheCreation.ephemeral_1h_input_tokens);
  return {
    inputTokens: tokenCount(record.input_tokens),
    outputTokens: tokenCount(record.output_tokens),
    cacheReadTokens: tokenCount(record.cache_read_input_tokens),
    cacheWriteTokens: Math.max(tokenCount(record.cache_creation_input_tokens), cacheWriteFromBreakdown),
  };
}

export interface CodexTokenUsage extends TokenUsage {
  reasoningOutputTokens: number;
  totalTokens: number;
}

/** Codex `total_token_usage`/`last_token_usage`: input includes cached input. */
export function usageFromCodexRecord(value: unknown): CodexTokenUsage {
  const record = asRecord(value);
  const usage: CodexTokenUsage = {
    inputTokens: tokenCount(record.input_tokens),
    outputTokens: tokenCount(record.output_tokens),
    cacheReadTokens: tokenCount(record.cached_input_tokens),
    cacheWriteTokens: 0,
    reasoningOutputTokens: tokenCount(record.reasoning_output_tokens),
    totalTokens: tokenCount(record.total_tokens),
  };
  if (usage.totalTokens === 0) {
    usage.totalTokens = usage.inputTokens + usage.outputTokens;
  }
  return usage;
}

/** Gemini `tokens`: input includes cached input, thoughts bill as output. */
export function usageFromGeminiTokens(value: unknown): TokenUsage {
  const record = asRecord(value);
  return {
    inputTokens: tokenCount(record.input),
    outputTokens: tokenCount(record.output) + tokenCount(record.thoughts),
    cacheReadTokens: tokenCount(record.cached),
    cacheWriteTokens: 0,
  };
}

export interface PiUsage extends TokenUsage {
  /** Cost recorded by the tool itself, when present. */
  recordedCostUsd: number | null;
}

export function usageFromPiRecord(value: unknown): PiUsage {
  const record = asRecord(value);
  const cost = asRecord(record.cost).total;
  return {
    inputTokens: tokenCount(record.input),
    outputTokens: tokenCount(record.output),
    cacheReadTokens: tokenCount(record.cacheRead),
    cacheWriteTokens: tokenCount(record.cacheWrite),
    recordedCostUsd: typeof cost === "number" && Number.isFinite(cost) && cost >= 0 ? cost : null,
  };
}

/** Moves cached input out of inputTokens for formats that report it inclusively. */
export function uncachedInput(usage: TokenUsage): TokenUsage {
  return {
    ...usage,
    inputTokens: Math.max(0, usage.inputTokens - usage.cacheReadTokens - usage.cacheWriteTokens),
  };
}

export function roundUsd(value: number): number {
  return Number(value.toFixed(6));
}

export function usageDedupKey(raw: Record<string, unknown>, message: Record<string, unknown>): string {
  const requestId = stringField(raw.requestId).trim();
  if (requestId) return `request:${requestId}`;

  const messageId = stringField(message.id).trim();
  if (messageId) return `message:${messageId}`;

  return "";
}

/** Model with the most recorded turns; ties go to the one seen first. */
export function primaryModel(counts: Record<string, number>): string {
  let best = "";
  let bestCount = 0;
  for (const [model, count] of Object.entries(counts)) {
    if (count > bestCount) {
      best = model;
      bestCount = count;
    }
  }
  return best;
}

export function countModel(counts: Record<string, number>, model: string): void {
  const trimmed = model.trim();
  if (!trimmed || trimmed === "<synthetic>") return;
  counts[trimmed] = (counts[trimmed] ?? 0) + 1;
}
