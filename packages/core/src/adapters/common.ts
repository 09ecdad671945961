import type { Message, MessageRole, ToleranceConfig, ToolUse } from "@sessionscope/contracts";
import { FormatError } from "../errors.js";
import { IncrementalReader, withReader, type JsonlReader, type ReaderOptions } from "../jsonl/readers.js";
import type { CoreLogger } from "../logger.js";
import { asArray, asRecord, asString, isRecord, stringField } from "../utils.js";

export type ContentPart =
  | { kind: "text"; text: string }
  | { kind: "tool_use"; id: string; name: string; input: string }
  | { kind: "tool_result"; toolUseId: string; output: string; isError: boolean }
  | { kind: "thinking"; text: string };

export function parseJsonRecord(line: Buffer | string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof line === "string" ? line : line.toString("utf8"));
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

export function roleFromString(raw: string): MessageRole | null {
  const lowered = raw.trim().toLowerCase();
  if (lowered === "user") return "user";
  if (lowered === "assistant" || lowered === "gemini" || lowered === "model") return "assistant";
  if (lowered === "system" || lowered === "developer") return "system";
  return null;
}

/** Text of a tool result, which may be a string, a list of text blocks, or any JSON value. */
export function toolOutputText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const texts = value
      .map((item) => (typeof item === "string" ? item : stringField(asRecord(item).text)))
      .filter((text) => text.length > 0);
    if (texts.length > 0) return texts.join("\n");
  }
  return asString(value);
}

export function toolInputText(value: unknown): string {
  return typeof value === "string" ? value : asString(value);
}

export function decodeContentParts(content: unknown): ContentPart[] {
  if (typeof content === "string") {
    return content ? [{ kind: "text", text: content }] : [];
  }
  const parts: ContentPart[] = [];
  for (const item of asArray(content)) {
    if (typeof item === "string") {
      if (item) parts.push({ kind: "text", text: item });
      continue;
    }
    const record = asRecord(item);
    const itemType = stringField(record.type).toLowerCase();
    switch (itemType) {
      case "text":
      case "input_text":
      case "output_text": {
        const text = stringField(record.text);
        if (text) parts.push({ kind: "text", text });
        break;
      }
      case "tool_use":
      case "toolcall":
      case "function_call":
        parts.push({
          kind: "tool_use",
          id: stringField(record.id) || stringField(record.call_id),
          name: stringField(record.name) || "tool",
          input: toolInputText(record.input ?? record.arguments),
        });
        break;
      case "tool_result":
      case "function_call_output":
        parts.push({
          kind: "tool_result",
          toolUseId: stringField(record.tool_use_id) || stringField(record.call_id),
          output: toolOutputText(record.content ?? record.output),
          isError: record.is_error === true,
        });
        break;
      case "thinking":
      case "reasoning": {
        const text = stringField(record.thinking) || stringField(record.text);
        if (text) parts.push({ kind: "thinking", text });
        break;
      }
      default:
        break;
    }
  }
  return parts;
}

export function textOfParts(parts: ContentPart[]): string {
  return parts
    .flatMap((part) => (part.kind === "text" ? [part.text] : []))
    .join("\n")
    .trim();
}

export function toolUsesOfParts(parts: ContentPart[]): ToolUse[] {
  return parts.flatMap((part) =>
    part.kind === "tool_use" ? [{ id: part.id, name: part.name, input: part.input, output: "", isError: false }] : [],
  );
}

export interface LineCounts {
  lines: number;
  malformed: number;
}

export function malformedAllowance(tolerance: ToleranceConfig, lines: number): number {
  const perLines = Math.max(1, tolerance.perLines);
  return Math.max(tolerance.malformedLines, Math.ceil((lines * tolerance.malformedLines) / perLines));
}

export interface JsonlFoldOptions {
  tolerance: ToleranceConfig;
  reader: ReaderOptions;
  logger: CoreLogger;
}

/**
 * Feeds every JSON object line of `reader` to `visit`. Malformed lines are skipped
 * and counted until they exceed the tolerance. An unterminated last line that does
 * not parse is taken as a write in progress and left for the next read. Resolves to
 * the offset a later fold should resume from.
 */
export async function foldLines(
  reader: JsonlReader,
  startOffset: number,
  counts: LineCounts,
  options: JsonlFoldOptions,
  visit: (record: Record<string, unknown>, lineOffset: number) => void,
): Promise<number> {
  let resumeOffset = startOffset;
  for (;;) {
    const line = await reader.next();
    if (line === null) break;
    if (isBlank(line)) {
      if (reader.lastLineTerminated) resumeOffset = reader.offset;
      continue;
    }
    const record = parseJsonRecord(line);
    if (!record) {
      if (!reader.lastLineTerminated) break;
      counts.lines += 1;
      counts.malformed += 1;
      options.logger.debug("skipping malformed line", { path: reader.path, offset: reader.lineStart });
      if (counts.malformed > malformedAllowance(options.tolerance, counts.lines)) {
        throw new FormatError(`${counts.malformed} malformed lines in ${counts.lines}`, reader.path, reader.lineStart);
      }
      resumeOffset = reader.offset;
      continue;
    }
    counts.lines += 1;
    visit(record, reader.lineStart);
    resumeOffset = reader.offset;
  }
  return resumeOffset;
}

/** foldLines over the file from `startOffset` to its end. */
export async function foldJsonl(
  filePath: string,
  startOffset: number,
  counts: LineCounts,
  options: JsonlFoldOptions,
  visit: (record: Record<string, unknown>, lineOffset: number) => void,
): Promise<number> {
  return withReader(IncrementalReader.open(filePath, startOffset, options.reader), (reader) =>
    foldLines(reader, startOffset, counts, options, visit),
  );
}

function isBlank(line: Buffer): boolean {
  for (const byte of line) {
    if (byte !== 0x20 && byte !== 0x09) return false;
  }
  return true;
}

interface PendingToolResult {
  output: string;
  isError: boolean;
}

/**
 * Collects messages in record order and holds tool results aside until the stream
 * ends, then attaches each result to the tool use with the same id.
 */
export class TranscriptBuilder {
  private readonly messages: Message[] = [];
  private readonly pendingResults = new Map<string, PendingToolResult>();

  constructor(private readonly logger: CoreLogger) {}

  push(message: Message): Message {
    this.messages.push(message);
    return message;
  }

  last(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  /** The trailing assistant message, or a new empty one when the last turn was not the assistant's. */
  assistantTurn(seed: Pick<Message, "id" | "timestampMs" | "model">): Message {
    const last = this.last();
    if (last && last.role === "assistant") return last;
    return this.push({
      ...seed,
      role: "assistant",
      content: "",
      toolUses: [],
      thinkingBlocks: [],
      usage: null,
    });
  }

  recordToolResult(toolUseId: string, output: string, isError: boolean): void {
    if (!toolUseId) return;
    this.pendingResults.set(toolUseId, { output, isError });
  }

  get size(): number {
    return this.messages.length;
  }

  finish(): Message[] {
    const owners = new Map<string, ToolUse>();
    for (const message of this.messages) {
      for (const toolUse of message.toolUses) {
        if (toolUse.id) owners.set(toolUse.id, toolUse);
      }
    }
    for (const [toolUseId, result] of this.pendingResults) {
      const owner = owners.get(toolUseId);
      if (!owner) {
        this.logger.debug("dropping tool result without a matching tool use", { toolUseId });
        continue;
      }
      owner.output = result.output;
      owner.isError = result.isError;
    }
    this.pendingResults.clear();
    return this.messages;
  }
}
