import path from "node:path";
import type { Message, MessageRole, SessionFileSummary, ThinkingBlock } from "@sessionscope/contracts";
import type { ComputedValue, MetaCacheEntry } from "../cache/metaCache.js";
import type { ListedFile, ListingOptions } from "../discovery.js";
import { HeadReader, TailReader, withReader } from "../jsonl/readers.js";
import {
  countModel,
  emptyUsage,
  primaryModel,
  roundUsd,
  uncachedInput,
  usageFromCodexRecord,
  type CodexTokenUsage,
} from "../metrics.js";
import { modelCost } from "../pricing.js";
import type { ResolvedProjectPath } from "../projectPath.js";
import { asArray, asRecord, maxTimestamp, minTimestamp, parseEpochMs, stringField } from "../utils.js";
import { FileSessionAdapter, type CachedSummary, type ListingRoot, type SessionTranscript } from "./base.js";
import {
  decodeContentParts,
  foldJsonl,
  foldLines,
  roleFromString,
  textOfParts,
  toolInputText,
  toolOutputText,
  toolUsesOfParts,
  TranscriptBuilder,
  type ContentPart,
  type LineCounts,
} from "./common.js";
import type { AdapterOptions } from "./types.js";

type CodexRecord =
  | { kind: "session_meta"; timestampMs: number | null; id: string; cwd: string; startedMs: number | null }
  | { kind: "turn_context"; timestampMs: number | null; cwd: string; model: string }
  | { kind: "message"; timestampMs: number | null; id: string; role: MessageRole; parts: ContentPart[] }
  | { kind: "tool_call"; timestampMs: number | null; callId: string; name: string; input: string }
  | { kind: "tool_result"; timestampMs: number | null; callId: string; output: string; isError: boolean }
  | { kind: "reasoning"; timestampMs: number | null; text: string }
  | {
      kind: "token_count";
      timestampMs: number | null;
      total: CodexTokenUsage | null;
      last: CodexTokenUsage | null;
    }
  | { kind: "ignored"; timestampMs: number | null };

function reasoningText(payload: Record<string, unknown>): string {
  const fromSummary = asArray(payload.summary).map((item) => stringField(asRecord(item).text));
  const fromContent = asArray(payload.content).map((item) => stringField(asRecord(item).text));
  return [...fromSummary, ...fromContent]
    .filter((text) => text.trim().length > 0)
    .join("\n")
    .trim();
}

function functionOutput(value: unknown): { output: string; isError: boolean } {
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.startsWith("{")) {
      try {
        const parsed = asRecord(JSON.parse(trimmed));
        if (typeof parsed.output === "string") {
          const exitCode = asRecord(parsed.metadata).exit_code;
          return { output: parsed.output, isError: typeof exitCode === "number" && exitCode !== 0 };
        }
      } catch {
        return { output: value, isError: false };
      }
    }
    return { output: value, isError: false };
  }
  const record = asRecord(value);
  return { output: toolOutputText(record.content ?? record.output ?? value), isError: record.success === false };
}

/** Structural decode of one rollout line; null when the line has no usable shape. */
export function decodeCodexRecord(raw: Record<string, unknown>): CodexRecord | null {
  const type = raw.type;
  if (typeof type !== "string") return null;
  const timestampMs = parseEpochMs(raw.timestamp);
  const payload = raw.payload;
  const needsPayload = type === "session_meta" || type === "response_item" || type === "event_msg" || type === "turn_context";
  if (!needsPayload) return { kind: "ignored", timestampMs };
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) return null;
  const body = asRecord(payload);

  if (type === "session_meta") {
    return {
      kind: "session_meta",
      timestampMs,
      id: stringField(body.id),
      cwd: stringField(body.cwd),
      startedMs: parseEpochMs(body.timestamp),
    };
  }

  if (type === "turn_context") {
    return { kind: "turn_context", timestampMs, cwd: stringField(body.cwd), model: stringField(body.model) };
  }

  if (type === "event_msg") {
    if (body.type !== "token_count") return { kind: "ignored", timestampMs };
    const info = body.info;
    if (info === null || info === undefined) return { kind: "token_count", timestampMs, total: null, last: null };
    const infoRecord = asRecord(info);
    return {
      kind: "token_count",
      timestampMs,
      total: infoRecord.total_token_usage ? usageFromCodexRecord(infoRecord.total_token_usage) : null,
      last: infoRecord.last_token_usage ? usageFromCodexRecord(infoRecord.last_token_usage) : null,
    };
  }

  const itemType = stringField(body.type);
  switch (itemType) {
    case "message": {
      const role = roleFromString(stringField(body.role));
      if (!role) return { kind: "ignored", timestampMs };
      return { kind: "message", timestampMs, id: stringField(body.id), role, parts: decodeContentParts(body.content) };
    }
    case "function_call":
    case "custom_tool_call":
    case "local_shell_call":
      return {
        kind: "tool_call",
        timestampMs,
        callId: stringField(body.call_id) || stringField(body.id),
        name: stringField(body.name) || (itemType === "local_shell_call" ? "shell" : "tool"),
        input: toolInputText(body.arguments ?? body.input ?? body.action),
      };
    case "function_call_output":
    case "custom_tool_call_output": {
      const result = functionOutput(body.output);
      return { kind: "tool_result", timestampMs, callId: stringField(body.call_id), ...result };
    }
    case "reasoning":
      return { kind: "reasoning", timestampMs, text: reasoningText(body) };
    default:
      return { kind: "ignored", timestampMs };
  }
}

interface CodexFoldState {
  counts: LineCounts;
  sessionId: string;
  cwd: string;
  startTimeMs: number | null;
  lastTimestampMs: number | null;
  messageCount: number;
  lastRole: MessageRole | "";
  firstUserMessage: string;
  model: string;
  modelCounts: Record<string, number>;
  totals: CodexTokenUsage | null;
}

function freshState(): CodexFoldState {
  return {
    counts: { lines: 0, malformed: 0 },
    sessionId: "",
    cwd: "",
    startTimeMs: null,
    lastTimestampMs: null,
    messageCount: 0,
    lastRole: "",
    firstUserMessage: "",
    model: "",
    modelCounts: {},
    totals: null,
  };
}

// injected context blocks, not something the user typed
function isInjectedContext(text: string): boolean {
  return text.startsWith("<");
}

function applyRecord(state: CodexFoldState, record: CodexRecord): void {
  state.lastTimestampMs = maxTimestamp(state.lastTimestampMs, record.timestampMs);
  switch (record.kind) {
    case "session_meta":
      state.sessionId ||= record.id;
      state.cwd ||= record.cwd;
      state.startTimeMs = minTimestamp(state.startTimeMs, record.startedMs ?? record.timestampMs);
      return;
    case "turn_context":
      state.cwd ||= record.cwd;
      if (record.model) state.model = record.model;
      return;
    case "message": {
      state.messageCount += 1;
      state.lastRole = record.role;
      if (record.role === "assistant") countModel(state.modelCounts, state.model);
      const text = textOfParts(record.parts);
      if (record.role === "user" && !state.firstUserMessage && text && !isInjectedContext(text)) {
        state.firstUserMessage = text;
      }
      return;
    }
    case "tool_call":
      if (state.lastRole !== "assistant") {
        state.messageCount += 1;
        state.lastRole = "assistant";
        countModel(state.modelCounts, state.model);
      }
      return;
    case "token_count":
      if (record.total) state.totals = record.total;
      return;
    default:
      return;
  }
}

/** Rollout filenames end with the session UUID. */
export function sessionIdFromFileName(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath));
  const uuid = base.match(/([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})$/i);
  return uuid?.[1]?.toLowerCase() ?? base;
}

interface TokenTally {
  /** Latest cumulative usage; authoritative. */
  totals: CodexTokenUsage | null;
  /** Sum of per-turn usage, input plus output. */
  summed: number;
  sawLast: boolean;
}

const LISTING: ListingOptions = { includeGlobs: ["**/*.jsonl"], deep: 6 };
const DISCREPANCY_RATIO = 0.01;

/** Codex CLI rollouts: `root/yyyy/mm/dd/rollout-*.jsonl`, one record per line. */
export class CodexAdapter extends FileSessionAdapter<CodexFoldState> {
  readonly name = "Codex";
  readonly icon = "◆";

  constructor(options: AdapterOptions = {}) {
    super("codex", options);
  }

  protected async projectRoots(_project: ResolvedProjectPath): Promise<ListingRoot[]> {
    return this.allRoots();
  }

  protected allRoots(): ListingRoot[] {
    return [{ path: this.root, listing: LISTING }];
  }

  protected async summarizeFile(
    file: ListedFile,
    previous: MetaCacheEntry<CachedSummary<CodexFoldState>> | undefined,
  ): Promise<ComputedValue<CachedSummary<CodexFoldState>>> {
    const visit = (state: CodexFoldState) => (raw: Record<string, unknown>) => {
      const record = decodeCodexRecord(raw);
      if (record) applyRecord(state, record);
    };
    const { headLines, tailBytes } = this.config.reader;

    if (previous && previous.sizeBytes <= file.sizeBytes && previous.offset <= file.sizeBytes) {
      const state = previous.value.state;
      const offset = await foldJsonl(file.path, previous.offset, state.counts, this.foldOptions, visit(state));
      return { value: { summary: this.summaryOf(file, state), state }, offset };
    }

    const state = freshState();
    if (file.sizeBytes <= tailBytes) {
      const offset = await foldJsonl(file.path, 0, state.counts, this.foldOptions, visit(state));
      return { value: { summary: this.summaryOf(file, state), state }, offset };
    }

    // listing reads the head and the tail only; the middle is left to messages() and usage()
    const headOffset = await withReader(HeadReader.open(file.path, headLines, this.readerOptions), (reader) =>
      foldLines(reader, 0, state.counts, this.foldOptions, visit(state)),
    );
    const offset = await withReader(TailReader.open(file.path, tailBytes, this.readerOptions), (reader) =>
      foldLines(reader, headOffset, state.counts, this.foldOptions, (raw, lineOffset) => {
        if (lineOffset >= headOffset) visit(state)(raw);
      }),
    );
    return { value: { summary: this.summaryOf(file, state), state }, offset };
  }

  private summaryOf(file: ListedFile, state: CodexFoldState): SessionFileSummary {
    const model = primaryModel(state.modelCounts) || state.model;
    const totals = state.totals;
    const usage = totals
      ? {
          inputTokens: totals.inputTokens,
          outputTokens: totals.outputTokens,
          cacheReadTokens: totals.cacheReadTokens,
          cacheWriteTokens: 0,
        }
      : emptyUsage();
    return {
      path: file.path,
      sessionId: state.sessionId || sessionIdFromFileName(file.path),
      startTimeMs: state.startTimeMs,
      lastUpdatedMs: state.lastTimestampMs,
      cwd: state.cwd,
      messageCount: state.messageCount,
      usage,
      estCostUsd: roundUsd(modelCost(model, uncachedInput(usage))),
      primaryModel: model,
      firstUserMessage: state.firstUserMessage,
      malformedLines: state.counts.malformed,
    };
  }

  protected async readTranscript(filePath: string): Promise<SessionTranscript> {
    const builder = new TranscriptBuilder(this.logger);
    const counts: LineCounts = { lines: 0, malformed: 0 };
    let pendingThinking: ThinkingBlock[] = [];
    let sessionId = "";
    let model = "";
    const tokens: TokenTally = { totals: null, summed: 0, sawLast: false };

    const takeThinking = (message: Message): void => {
      if (pendingThinking.length === 0) return;
      message.thinkingBlocks.push(...pendingThinking);
      pendingThinking = [];
    };

    await foldJsonl(filePath, 0, counts, this.foldOptions, (raw, lineOffset) => {
      const record = decodeCodexRecord(raw);
      if (!record) return;
      switch (record.kind) {
        case "session_meta":
          sessionId ||= record.id;
          return;
        case "turn_context":
          if (record.model) model = record.model;
          return;
        case "message": {
          const message = builder.push({
            id: record.id || `line-${lineOffset}`,
            role: record.role,
            content: textOfParts(record.parts),
            timestampMs: record.timestampMs,
            model: record.role === "assistant" ? model : "",
            toolUses: toolUsesOfParts(record.parts),
            thinkingBlocks: record.parts.flatMap((part) =>
              part.kind === "thinking" ? [{ content: part.text, timestampMs: record.timestampMs }] : [],
            ),
            usage: null,
          });
          for (const part of record.parts) {
            if (part.kind === "tool_result") builder.recordToolResult(part.toolUseId, part.output, part.isError);
          }
          if (record.role === "assistant") takeThinking(message);
          return;
        }
        case "tool_call": {
          const turn = builder.assistantTurn({ id: `line-${lineOffset}`, timestampMs: record.timestampMs, model });
          turn.toolUses.push({ id: record.callId, name: record.name, input: record.input, output: "", isError: false });
          takeThinking(turn);
          return;
        }
        case "tool_result":
          builder.recordToolResult(record.callId, record.output, record.isError);
          return;
        case "reasoning":
          if (record.text) pendingThinking.push({ content: record.text, timestampMs: record.timestampMs });
          return;
        case "token_count":
          if (record.total) tokens.totals = record.total;
          if (record.last) {
            tokens.sawLast = true;
            tokens.summed += record.last.inputTokens + record.last.outputTokens;
          }
          return;
        default:
          return;
      }
    });

    const messages = builder.finish();
    const lastAssistant = [...messages].reverse().find((message) => message.role === "assistant");
    if (lastAssistant && pendingThinking.length > 0) lastAssistant.thinkingBlocks.push(...pendingThinking);

    const finalTotals = tokens.totals;
    if (finalTotals && tokens.sawLast) this.warnOnDiscrepancy(filePath, finalTotals, tokens.summed);
    const usage = finalTotals
      ? {
          inputTokens: finalTotals.inputTokens,
          outputTokens: finalTotals.outputTokens,
          cacheReadTokens: finalTotals.cacheReadTokens,
          cacheWriteTokens: 0,
        }
      : emptyUsage();
    const modelCounts: Record<string, number> = {};
    for (const message of messages) {
      if (message.role === "assistant") countModel(modelCounts, message.model);
    }
    const pricedModel = primaryModel(modelCounts) || model;
    return {
      sessionId: sessionId || sessionIdFromFileName(filePath),
      messages,
      usage,
      estCostUsd: roundUsd(modelCost(pricedModel, uncachedInput(usage))),
    };
  }

  private warnOnDiscrepancy(filePath: string, totals: CodexTokenUsage, summed: number): void {
    const reported = totals.inputTokens + totals.outputTokens;
    if (reported === 0) return;
    if (Math.abs(reported - summed) / reported > DISCREPANCY_RATIO) {
      this.logger.warn("final token count disagrees with per-turn usage", { path: filePath, reported, summed });
    }
  }
}
