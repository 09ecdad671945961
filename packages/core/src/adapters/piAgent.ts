import path from "node:path";
import type { SessionFileSummary, TokenUsage } from "@sessionscope/contracts";
import type { ComputedValue, MetaCacheEntry } from "../cache/metaCache.js";
import { listDirectories, type ListedFile, type ListingOptions } from "../discovery.js";
import { addUsage, countModel, emptyUsage, primaryModel, roundUsd, usageFromPiRecord, type PiUsage } from "../metrics.js";
import { modelCost } from "../pricing.js";
import type { ResolvedProjectPath } from "../projectPath.js";
import { asRecord, maxTimestamp, minTimestamp, parseEpochMs, stringField } from "../utils.js";
import { FileSessionAdapter, type CachedSummary, type ListingRoot, type SessionTranscript } from "./base.js";
import {
  decodeContentParts,
  foldJsonl,
  textOfParts,
  toolOutputText,
  toolUsesOfParts,
  TranscriptBuilder,
  type ContentPart,
  type LineCounts,
} from "./common.js";
import type { AdapterOptions } from "./types.js";

/** `/home/user/project` lives in `--home-user-project--`; the filesystem root in `----`. */
export function projectDirName(projectPath: string): string {
  const trimmed = projectPath.replace(/^[/\\]+/, "");
  return `--${trimmed.replace(/[/\\:]/g, "-")}--`;
}

type PiRecord =
  | { kind: "session"; timestampMs: number | null; id: string; cwd: string }
  | { kind: "model_change"; timestampMs: number | null; model: string }
  | {
      kind: "turn";
      timestampMs: number | null;
      id: string;
      role: "user" | "assistant";
      model: string;
      parts: ContentPart[];
      usage: PiUsage | null;
    }
  | { kind: "tool_result"; timestampMs: number | null; toolCallId: string; output: string; isError: boolean }
  | { kind: "ignored"; timestampMs: number | null };

export function decodePiRecord(raw: Record<string, unknown>): PiRecord | null {
  const type = raw.type;
  if (typeof type !== "string") return null;
  const timestampMs = parseEpochMs(raw.timestamp);
  switch (type) {
    case "session":
      return { kind: "session", timestampMs, id: stringField(raw.id), cwd: stringField(raw.cwd) };
    case "model_change":
      return { kind: "model_change", timestampMs, model: stringField(raw.modelId) };
    case "message":
      break;
    default:
      return { kind: "ignored", timestampMs };
  }

  const message = raw.message;
  if (!message || typeof message !== "object" || Array.isArray(message)) return null;
  const body = asRecord(message);
  const role = stringField(body.role);
  if (role === "toolResult") {
    return {
      kind: "tool_result",
      timestampMs,
      toolCallId: stringField(body.toolCallId),
      output: toolOutputText(body.content),
      isError: body.isError === true,
    };
  }
  if (role !== "user" && role !== "assistant") return { kind: "ignored", timestampMs };
  return {
    kind: "turn",
    timestampMs,
    id: stringField(raw.id),
    role,
    model: stringField(body.model),
    parts: decodeContentParts(body.content),
    usage: body.usage ? usageFromPiRecord(body.usage) : null,
  };
}

/** Recorded cost when the session has one, otherwise priced from the model. */
function turnCost(usage: PiUsage, model: string): number {
  return usage.recordedCostUsd ?? modelCost(model, usage);
}

function plainUsage(usage: PiUsage): TokenUsage {
  return {
    inputTokens: usage.inputTokens,
    outputTokens: usage.outputTokens,
    cacheReadTokens: usage.cacheReadTokens,
    cacheWriteTokens: usage.cacheWriteTokens,
  };
}

interface PiFoldState {
  counts: LineCounts;
  sessionId: string;
  cwd: string;
  startTimeMs: number | null;
  lastTimestampMs: number | null;
  messageCount: number;
  model: string;
  modelCounts: Record<string, number>;
  firstUserMessage: string;
  usage: TokenUsage;
  costUsd: number;
}

function freshState(): PiFoldState {
  return {
    counts: { lines: 0, malformed: 0 },
    sessionId: "",
    cwd: "",
    startTimeMs: null,
    lastTimestampMs: null,
    messageCount: 0,
    model: "",
    modelCounts: {},
    firstUserMessage: "",
    usage: emptyUsage(),
    costUsd: 0,
  };
}

function applyRecord(state: PiFoldState, record: PiRecord): void {
  state.lastTimestampMs = maxTimestamp(state.lastTimestampMs, record.timestampMs);
  switch (record.kind) {
    case "session":
      state.sessionId ||= record.id;
      state.cwd ||= record.cwd;
      state.startTimeMs = minTimestamp(state.startTimeMs, record.timestampMs);
      return;
    case "model_change":
      if (record.model) state.model = record.model;
      return;
    case "turn": {
      state.messageCount += 1;
      state.startTimeMs = minTimestamp(state.startTimeMs, record.timestampMs);
      const model = record.model || state.model;
      if (record.role === "assistant") countModel(state.modelCounts, model);
      if (record.usage) {
        addUsage(state.usage, plainUsage(record.usage));
        state.costUsd += turnCost(record.usage, model);
      }
      const text = textOfParts(record.parts);
      if (record.role === "user" && !state.firstUserMessage && text) state.firstUserMessage = text;
      return;
    }
    default:
      return;
  }
}

/** Session files are named `<timestamp>_<session id>.jsonl`. */
export function sessionIdFromPiFileName(filePath: string): string {
  const base = path.basename(filePath, ".jsonl");
  const separator = base.indexOf("_");
  return separator >= 0 ? base.slice(separator + 1) : base;
}

const LISTING: ListingOptions = { includeGlobs: ["*.jsonl"], deep: 1 };

/** Pi Agent sessions: `root/--<project path with dashes>--/<timestamp>_<id>.jsonl`. */
export class PiAgentAdapter extends FileSessionAdapter<PiFoldState> {
  readonly name = "Pi Agent";
  readonly icon = "π";

  constructor(options: AdapterOptions = {}) {
    super("pi-agent", options);
  }

  // Subdirectories of the project get their own `--...--` directory sharing its prefix.
  protected async projectRoots(project: ResolvedProjectPath): Promise<ListingRoot[]> {
    const names = new Set([projectDirName(project.cleaned), projectDirName(project.resolved)]);
    const prefixes = [...names].map((name) => name.slice(0, -2));
    const directories = await listDirectories(this.root, 1);
    return directories
      .filter((dir) => dir.path !== this.root)
      .filter((dir) => {
        const name = path.basename(dir.path);
        return names.has(name) || prefixes.some((prefix) => name.startsWith(`${prefix}-`));
      })
      .map((dir) => ({ path: dir.path, listing: LISTING }));
  }

  protected allRoots(): ListingRoot[] {
    return [{ path: this.root, listing: { includeGlobs: ["*/*.jsonl"], deep: 2 } }];
  }

  protected async summarizeFile(
    file: ListedFile,
    previous: MetaCacheEntry<CachedSummary<PiFoldState>> | undefined,
  ): Promise<ComputedValue<CachedSummary<PiFoldState>>> {
    let state = freshState();
    let startOffset = 0;
    if (previous && previous.sizeBytes <= file.sizeBytes && previous.offset <= file.sizeBytes) {
      state = previous.value.state;
      startOffset = previous.offset;
    }
    const offset = await foldJsonl(file.path, startOffset, state.counts, this.foldOptions, (raw) => {
      const record = decodePiRecord(raw);
      if (record) applyRecord(state, record);
    });
    return { value: { summary: this.summaryOf(file, state), state }, offset };
  }

  private summaryOf(file: ListedFile, state: PiFoldState): SessionFileSummary {
    return {
      path: file.path,
      sessionId: state.sessionId || sessionIdFromPiFileName(file.path),
      startTimeMs: state.startTimeMs,
      lastUpdatedMs: state.lastTimestampMs,
      cwd: state.cwd,
      messageCount: state.messageCount,
      usage: { ...state.usage },
      estCostUsd: roundUsd(state.costUsd),
      primaryModel: primaryModel(state.modelCounts) || state.model,
      firstUserMessage: state.firstUserMessage,
      malformedLines: state.counts.malformed,
    };
  }

  protected async readTranscript(filePath: string): Promise<SessionTranscript> {
    const builder = new TranscriptBuilder(this.logger);
    const counts: LineCounts = { lines: 0, malformed: 0 };
    const usage = emptyUsage();
    let costUsd = 0;
    let sessionId = "";
    let currentModel = "";

    await foldJsonl(filePath, 0, counts, this.foldOptions, (raw, lineOffset) => {
      const record = decodePiRecord(raw);
      if (!record) return;
      switch (record.kind) {
        case "session":
          sessionId ||= record.id;
          return;
        case "model_change":
          if (record.model) currentModel = record.model;
          return;
        case "tool_result":
          builder.recordToolResult(record.toolCallId, record.output, record.isError);
          return;
        case "turn": {
          const model = record.model || currentModel;
          if (record.usage) {
            addUsage(usage, plainUsage(record.usage));
            costUsd += turnCost(record.usage, model);
          }
          builder.push({
            id: record.id || `line-${lineOffset}`,
            role: record.role,
            content: textOfParts(record.parts),
            timestampMs: record.timestampMs,
            model: record.role === "assistant" ? model : "",
            toolUses: toolUsesOfParts(record.parts),
            thinkingBlocks: record.parts.flatMap((part) =>
              part.kind === "thinking" ? [{ content: part.text, timestampMs: record.timestampMs }] : [],
            ),
            usage: record.usage ? plainUsage(record.usage) : null,
          });
          return;
        }
        default:
          return;
      }
    });

    return {
      sessionId: sessionId || sessionIdFromPiFileName(filePath),
      messages: builder.finish(),
      usage,
      estCostUsd: roundUsd(costUsd),
    };
  }
}
