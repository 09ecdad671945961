import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Message, MessageRole, SessionFileSummary, ThinkingBlock, TokenUsage, ToolUse } from "@sessionscope/contracts";
import type { ComputedValue } from "../cache/metaCache.js";
import type { ListedFile, ListingOptions } from "../discovery.js";
import { FormatError, toFsError } from "../errors.js";
import { addUsage, countModel, emptyUsage, primaryModel, roundUsd, uncachedInput, usageFromGeminiTokens } from "../metrics.js";
import { modelCost } from "../pricing.js";
import type { ResolvedProjectPath } from "../projectPath.js";
import { asArray, asRecord, isRecord, maxTimestamp, minTimestamp, parseEpochMs, stringField } from "../utils.js";
import { FileSessionAdapter, type CachedSummary, type ListingRoot, type SessionTranscript } from "./base.js";
import { toolInputText, toolOutputText } from "./common.js";
import type { AdapterOptions } from "./types.js";

/** Lowercase hex SHA-256 of the cleaned project path; names the project's directory under the root. */
export function projectHash(projectPath: string): string {
  return createHash("sha256").update(projectPath, "utf8").digest("hex");
}

interface GeminiMessage {
  id: string;
  role: MessageRole;
  timestampMs: number | null;
  content: string;
  model: string;
  usage: TokenUsage | null;
  toolUses: ToolUse[];
  thinkingBlocks: ThinkingBlock[];
}

export interface GeminiDocument {
  sessionId: string;
  projectHash: string;
  startTimeMs: number | null;
  lastUpdatedMs: number | null;
  messages: GeminiMessage[];
}

function roleOf(type: string): MessageRole | null {
  switch (type.trim().toLowerCase()) {
    case "info":
      return null;
    case "user":
      return "user";
    case "gemini":
    case "model":
    case "assistant":
      return "assistant";
    default:
      return "system";
  }
}

function contentText(value: unknown): string {
  if (typeof value === "string") return value;
  return asArray(value)
    .map((part) => (typeof part === "string" ? part : stringField(asRecord(part).text)))
    .filter((text) => text.length > 0)
    .join("\n");
}

function isErrorStatus(status: string): boolean {
  return /error|fail|cancel/i.test(status);
}

function functionResponses(call: Record<string, unknown>): Record<string, unknown>[] {
  const responses: Record<string, unknown>[] = [];
  if (isRecord(call.functionResponse)) responses.push(call.functionResponse);
  for (const item of asArray(call.result)) {
    const record = asRecord(item);
    if (isRecord(record.functionResponse)) responses.push(record.functionResponse);
  }
  return responses;
}

function toolCallOf(value: unknown, index: number): ToolUse {
  const call = asRecord(value);
  const responses = functionResponses(call);
  let output = "";
  let isError = isErrorStatus(stringField(call.status));
  if (responses.length > 0) {
    output = responses
      .map((response) => {
        const body = asRecord(response.response);
        if (body.error !== undefined) isError = true;
        return toolOutputText(body.output ?? body.error ?? response.output ?? response.response);
      })
      .filter((text) => text.length > 0)
      .join("\n");
  } else {
    output = stringField(call.resultDisplay) || (call.result === undefined ? "" : toolOutputText(call.result));
  }
  return {
    id: stringField(call.id) || `tool-${index}`,
    name: stringField(call.name) || stringField(call.displayName) || "tool",
    input: call.args === undefined ? "" : toolInputText(call.args),
    output,
    isError,
  };
}

function thoughtOf(value: unknown, fallbackMs: number | null): ThinkingBlock | null {
  const thought = asRecord(value);
  const subject = stringField(thought.subject).trim();
  const description = stringField(thought.description).trim();
  const content = subject && description ? `${subject}: ${description}` : subject || description;
  if (!content) return null;
  return { content, timestampMs: parseEpochMs(thought.timestamp) ?? fallbackMs };
}

/** Parses a whole chat document; info messages are dropped. */
export function parseGeminiDocument(raw: string, filePath: string): GeminiDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FormatError(`invalid JSON in ${filePath}`, filePath, -1, { cause: error });
  }
  if (!isRecord(parsed) || (parsed.messages !== undefined && !Array.isArray(parsed.messages))) {
    throw new FormatError(`unexpected chat document shape in ${filePath}`, filePath);
  }

  const messages: GeminiMessage[] = [];
  for (const [index, item] of asArray(parsed.messages).entries()) {
    if (!isRecord(item)) continue;
    const role = roleOf(stringField(item.type));
    if (!role) continue;
    const timestampMs = parseEpochMs(item.timestamp);
    messages.push({
      id: stringField(item.id) || `message-${index}`,
      role,
      timestampMs,
      content: contentText(item.content),
      model: stringField(item.model),
      usage: item.tokens === undefined ? null : usageFromGeminiTokens(item.tokens),
      toolUses: asArray(item.toolCalls).map(toolCallOf),
      thinkingBlocks: asArray(item.thoughts).flatMap((thought) => {
        const block = thoughtOf(thought, timestampMs);
        return block ? [block] : [];
      }),
    });
  }

  return {
    sessionId: stringField(parsed.sessionId),
    projectHash: stringField(parsed.projectHash),
    startTimeMs: parseEpochMs(parsed.startTime),
    lastUpdatedMs: parseEpochMs(parsed.lastUpdated),
    messages,
  };
}

async function readDocument(filePath: string): Promise<GeminiDocument> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw toFsError(error, "read", filePath);
  }
  return parseGeminiDocument(raw, filePath);
}

function documentUsage(document: GeminiDocument): { usage: TokenUsage; costUsd: number } {
  const usage = emptyUsage();
  let costUsd = 0;
  for (const message of document.messages) {
    if (!message.usage) continue;
    addUsage(usage, message.usage);
    costUsd += modelCost(message.model, uncachedInput(message.usage));
  }
  return { usage, costUsd };
}

function sessionIdOf(document: GeminiDocument, filePath: string): string {
  return document.sessionId || path.basename(filePath, ".json");
}

const LISTING: ListingOptions = { includeGlobs: ["*.json"], deep: 1 };

/** Gemini CLI chats: `root/<sha256 of project path>/chats/*.json`, rewritten whole on every turn. */
export class GeminiCliAdapter extends FileSessionAdapter<null> {
  readonly name = "Gemini CLI";
  readonly icon = "✦";

  constructor(options: AdapterOptions = {}) {
    super("gemini-cli", options);
  }

  protected async projectRoots(project: ResolvedProjectPath): Promise<ListingRoot[]> {
    const hashes = new Set([projectHash(project.cleaned), projectHash(project.resolved)]);
    return [...hashes].map((hash) => ({ path: path.join(this.root, hash, "chats"), listing: LISTING }));
  }

  protected allRoots(): ListingRoot[] {
    return [{ path: this.root, listing: { includeGlobs: ["*/chats/*.json"], deep: 3 } }];
  }

  // Chat files carry no cwd; the directory hash already scopes them to the project.
  protected belongsToProject(): boolean {
    return true;
  }

  protected async summarizeFile(file: ListedFile): Promise<ComputedValue<CachedSummary<null>>> {
    const document = await readDocument(file.path);
    return { value: { summary: this.summaryOf(file, document), state: null } };
  }

  private summaryOf(file: ListedFile, document: GeminiDocument): SessionFileSummary {
    const modelCounts: Record<string, number> = {};
    let startTimeMs = document.startTimeMs;
    let lastUpdatedMs = document.lastUpdatedMs;
    for (const message of document.messages) {
      if (message.role === "assistant") countModel(modelCounts, message.model);
      startTimeMs = minTimestamp(startTimeMs, message.timestampMs);
      lastUpdatedMs = maxTimestamp(lastUpdatedMs, message.timestampMs);
    }
    const { usage, costUsd } = documentUsage(document);
    const firstUser = document.messages.find((message) => message.role === "user" && message.content.trim());
    return {
      path: file.path,
      sessionId: sessionIdOf(document, file.path),
      startTimeMs,
      lastUpdatedMs,
      cwd: "",
      messageCount: document.messages.length,
      usage,
      estCostUsd: roundUsd(costUsd),
      primaryModel: primaryModel(modelCounts),
      firstUserMessage: firstUser?.content.trim() ?? "",
      malformedLines: 0,
    };
  }

  protected async readTranscript(filePath: string): Promise<SessionTranscript> {
    const document = await readDocument(filePath);
    const { usage, costUsd } = documentUsage(document);
    const messages: Message[] = document.messages.map((message) => ({ ...message }));
    return { sessionId: sessionIdOf(document, filePath), messages, usage, estCostUsd: roundUsd(costUsd) };
  }
}
