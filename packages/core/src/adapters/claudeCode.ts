import path from "node:path";
import type { Message, MessageRole, SessionFileSummary, TokenUsage } from "@sessionscope/contracts";
import type { ComputedValue, MetaCacheEntry } from "../cache/metaCache.js";
import { listDirectories, type ListedFile, type ListingOptions } from "../discovery.js";
import { addUsage, countModel, emptyUsage, primaryModel, roundUsd, usageDedupKey, usageFromAnthropicRecord } from "../metrics.js";
import { modelCost } from "../pricing.js";
import type { ResolvedProjectPath } from "../projectPath.js";
import { asRecord, maxTimestamp, minTimestamp, parseEpochMs, stringField } from "../utils.js";
import { FileSessionAdapter, type CachedSummary, type ListingRoot, type SessionTranscript } from "./base.js";
import {
  decodeContentParts,
  foldJsonl,
  roleFromString,
  textOfParts,
  toolUsesOfParts,
  TranscriptBuilder,
  type ContentPart,
  type LineCounts,
} from "./common.js";
import type { AdapterOptions } from "./types.js";

type ClaudeRecord =
  | {
      kind: "turn";
      timestampMs: number | null;
      uuid: string;
      sessionId: string;
      cwd: string;
      role: MessageRole;
      messageId: string;
      model: string;
      parts: ContentPart[];
      usage: TokenUsage | null;
      usageKey: string;
      isMeta: boolean;
    }
  | { kind: "ignored"; timestampMs: number | null; sessionId: string; cwd: string };

/** Claude Code names a project's directory after its path with every non-alphanumeric replaced by "-". */
export function encodeProjectDir(projectPath: string): string {
  return projectPath.replace(/[^a-zA-Z0-9]/g, "-");
}

export function decodeClaudeRecord(raw: Record<string, unknown>): ClaudeRecord | null {
  const type = raw.type;
  if (typeof type !== "string") return null;
  const timestampMs = parseEpochMs(raw.timestamp);
  const sessionId = stringField(raw.sessionId);
  const cwd = stringField(raw.cwd);
  if (type !== "user" && type !== "assistant") return { kind: "ignored", timestampMs, sessionId, cwd };

  const message = raw.message;
  if (!message || typeof message !== "object" || Array.isArray(message)) return null;
  const body = asRecord(message);
  const role = roleFromString(stringField(body.role) || type);
  if (!role) return null;
  return {
    kind: "turn",
    timestampMs,
    uuid: stringField(raw.uuid),
    sessionId,
    cwd,
    role,
    messageId: stringField(body.id),
    model: stringField(body.model),
    parts: decodeContentParts(body.content),
    usage: body.usage ? usageFromAnthropicRecord(body.usage) : null,
    usageKey: usageDedupKey(raw, body),
    isMeta: raw.isMeta === true,
  };
}

type TurnRecord = Extract<ClaudeRecord, { kind: "turn" }>;

/** User records that only carry tool results are plumbing, not turns. */
function isToolResultOnly(record: TurnRecord): boolean {
  return record.parts.length > 0 && record.parts.every((part) => part.kind === "tool_result");
}

function countsAsMessage(record: TurnRecord): boolean {
  if (record.isMeta) return false;
  return !(record.role === "user" && isToolResultOnly(record));
}

interface ClaudeFoldState {
  counts: LineCounts;
  sessionId: string;
  cwd: string;
  startTimeMs: number | null;
  lastTimestampMs: number | null;
  messageCount: number;
  /** API message id of the trailing assistant turn; later records with the same id extend it. */
  openAssistantId: string;
  lastUsageKey: string;
  firstUserMessage: string;
  modelCounts: Record<string, number>;
  usage: TokenUsage;
  costUsd: number;
}

function freshState(): ClaudeFoldState {
  return {
    counts: { lines: 0, malformed: 0 },
    sessionId: "",
    cwd: "",
    startTimeMs: null,
    lastTimestampMs: null,
    messageCount: 0,
    openAssistantId: "",
    lastUsageKey: "",
    firstUserMessage: "",
    modelCounts: {},
    usage: emptyUsage(),
    costUsd: 0,
  };
}

/** Records usage unless it repeats the previous record's request. */
function takeUsage(state: { lastUsageKey: string }, record: TurnRecord): TokenUsage | null {
  if (!record.usage) return null;
  if (record.usageKey && record.usageKey === state.lastUsageKey) return null;
  state.lastUsageKey = record.usageKey;
  return record.usage;
}

function continuesAssistant(openAssistantId: string, record: TurnRecord): boolean {
  return record.role === "assistant" && record.messageId !== "" && record.messageId === openAssistantId;
}

function applyRecord(state: ClaudeFoldState, record: ClaudeRecord): void {
  state.lastTimestampMs = maxTimestamp(state.lastTimestampMs, record.timestampMs);
  state.startTimeMs = minTimestamp(state.startTimeMs, record.timestampMs);
  state.sessionId ||= record.sessionId;
  state.cwd ||= record.cwd;
  if (record.kind !== "turn") return;

  const usage = takeUsage(state, record);
  if (usage) {
    addUsage(state.usage, usage);
    state.costUsd += modelCost(record.model, usage);
  }
  if (!countsAsMessage(record)) return;

  if (!continuesAssistant(state.openAssistantId, record)) {
    state.messageCount += 1;
    if (record.role === "assistant") countModel(state.modelCounts, record.model);
  }
  state.openAssistantId = record.role === "assistant" ? record.messageId : "";

  const text = textOfParts(record.parts);
  if (record.role === "user" && !state.firstUserMessage && text && !text.startsWith("<")) {
    state.firstUserMessage = text;
  }
}

const LISTING: ListingOptions = { includeGlobs: ["*.jsonl"], deep: 1 };

/** Claude Code transcripts: `root/<encoded project path>/<session id>.jsonl`. */
export class ClaudeCodeAdapter extends FileSessionAdapter<ClaudeFoldState> {
  readonly name = "Claude Code";
  readonly icon = "✻";

  constructor(options: AdapterOptions = {}) {
    super("claude-code", options);
  }

  // The encoding is lossy, so sibling directories sharing the prefix are listed too
  // and filtered on the recorded cwd.
  protected async projectRoots(project: ResolvedProjectPath): Promise<ListingRoot[]> {
    const prefixes = [...new Set([encodeProjectDir(project.cleaned), encodeProjectDir(project.resolved)])];
    const directories = await listDirectories(this.root, 1);
    return directories
      .filter((dir) => dir.path !== this.root)
      .filter((dir) => prefixes.some((prefix) => path.basename(dir.path).startsWith(prefix)))
      .map((dir) => ({ path: dir.path, listing: LISTING }));
  }

  protected allRoots(): ListingRoot[] {
    return [{ path: this.root, listing: { includeGlobs: ["*/*.jsonl"], deep: 2 } }];
  }

  protected async summarizeFile(
    file: ListedFile,
    previous: MetaCacheEntry<CachedSummary<ClaudeFoldState>> | undefined,
  ): Promise<ComputedValue<CachedSummary<ClaudeFoldState>>> {
    let state = freshState();
    let startOffset = 0;
    if (previous && previous.sizeBytes <= file.sizeBytes && previous.offset <= file.sizeBytes) {
      state = previous.value.state;
      startOffset = previous.offset;
    }
    const offset = await foldJsonl(file.path, startOffset, state.counts, this.foldOptions, (raw) => {
      const record = decodeClaudeRecord(raw);
      if (record) applyRecord(state, record);
    });
    return { value: { summary: this.summaryOf(file, state), state }, offset };
  }

  private summaryOf(file: ListedFile, state: ClaudeFoldState): SessionFileSummary {
    return {
      path: file.path,
      sessionId: state.sessionId || path.basename(file.path, ".jsonl"),
      startTimeMs: state.startTimeMs,
      lastUpdatedMs: state.lastTimestampMs,
      cwd: state.cwd,
      messageCount: state.messageCount,
      usage: { ...state.usage },
      estCostUsd: roundUsd(state.costUsd),
      primaryModel: primaryModel(state.modelCounts),
      firstUserMessage: state.firstUserMessage,
      malformedLines: state.counts.malformed,
    };
  }

  protected async readTranscript(filePath: string): Promise<SessionTranscript> {
    const builder = new TranscriptBuilder(this.logger);
    const counts: LineCounts = { lines: 0, malformed: 0 };
    const usage = emptyUsage();
    const dedup = { lastUsageKey: "" };
    let costUsd = 0;
    let sessionId = "";
    let openAssistantId = "";

    await foldJsonl(filePath, 0, counts, this.foldOptions, (raw, lineOffset) => {
      const record = decodeClaudeRecord(raw);
      if (!record) return;
      sessionId ||= record.sessionId;
      if (record.kind !== "turn") return;

      const recordUsage = takeUsage(dedup, record);
      if (recordUsage) {
        addUsage(usage, recordUsage);
        costUsd += modelCost(record.model, recordUsage);
      }
      for (const part of record.parts) {
        if (part.kind === "tool_result") builder.recordToolResult(part.toolUseId, part.output, part.isError);
      }
      if (!countsAsMessage(record)) return;

      const thinkingBlocks = record.parts.flatMap((part) =>
        part.kind === "thinking" ? [{ content: part.text, timestampMs: record.timestampMs }] : [],
      );
      const last = builder.last();
      if (last && continuesAssistant(openAssistantId, record)) {
        extendMessage(last, record, recordUsage, thinkingBlocks);
        return;
      }
      builder.push({
        id: record.uuid || `line-${lineOffset}`,
        role: record.role,
        content: textOfParts(record.parts),
        timestampMs: record.timestampMs,
        model: record.model,
        toolUses: toolUsesOfParts(record.parts),
        thinkingBlocks,
        usage: recordUsage ? { ...recordUsage } : null,
      });
      openAssistantId = record.role === "assistant" ? record.messageId : "";
    });

    return {
      sessionId: sessionId || path.basename(filePath, ".jsonl"),
      messages: builder.finish(),
      usage,
      estCostUsd: roundUsd(costUsd),
    };
  }
}

function extendMessage(
  message: Message,
  record: TurnRecord,
  usage: TokenUsage | null,
  thinkingBlocks: Message["thinkingBlocks"],
): void {
  const text = textOfParts(record.parts);
  if (text) message.content = message.content ? `${message.content}\n${text}` : text;
  message.toolUses.push(...toolUsesOfParts(record.parts));
  message.thinkingBlocks.push(...thinkingBlocks);
  if (usage) {
    if (message.usage) addUsage(message.usage, usage);
    else message.usage = { ...usage };
  }
}
