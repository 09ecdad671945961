import type { ContentMatch, Message, MessageMatch, SearchBlockType, SearchOptions } from "@sessionscope/contracts";
import { InvalidInputError } from "./errors.js";

export const DEFAULT_MAX_SEARCH_RESULTS = 50;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function compileSearchPattern(query: string, options: SearchOptions = {}): RegExp {
  const source = options.regex ? query : escapeRegExp(query);
  const flags = options.caseSensitive ? "g" : "gi";
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new InvalidInputError(`invalid search pattern: ${query}`, { cause: error });
  }
}

export function searchContent(content: string, blockType: SearchBlockType, pattern: RegExp): ContentMatch[] {
  if (!content) return [];
  const matches: ContentMatch[] = [];
  for (const [index, line] of content.split("\n").entries()) {
    for (const found of line.matchAll(pattern)) {
      // empty matches carry no position worth showing
      if (found[0].length === 0) continue;
      const colStart = found.index ?? 0;
      matches.push({ blockType, lineNo: index + 1, colStart, colEnd: colStart + found[0].length, line });
    }
  }
  return matches;
}

function searchMessage(message: Message, pattern: RegExp): ContentMatch[] {
  const all: ContentMatch[] = [...searchContent(message.content, "text", pattern)];
  for (const toolUse of message.toolUses) {
    all.push(...searchContent(toolUse.name, "tool_use", pattern));
    all.push(...searchContent(toolUse.input, "tool_use", pattern));
    all.push(...searchContent(toolUse.output, "tool_result", pattern));
  }
  for (const block of message.thinkingBlocks) {
    all.push(...searchContent(block.content, "thinking", pattern));
  }

  const seen = new Set<string>();
  return all.filter((match) => {
    const key = `${match.blockType}|${match.lineNo}|${match.colStart}|${match.colEnd}|${match.line}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Finds `query` across message text, tool calls and thinking, up to `maxResults` matches. */
export function searchMessageList(messages: Message[], query: string, options: SearchOptions = {}): MessageMatch[] {
  const maxResults = options.maxResults && options.maxResults > 0 ? options.maxResults : DEFAULT_MAX_SEARCH_RESULTS;
  const pattern = compileSearchPattern(query, options);
  const results: MessageMatch[] = [];
  let total = 0;

  for (const [messageIndex, message] of messages.entries()) {
    if (total >= maxResults) break;
    const matches = searchMessage(message, pattern).slice(0, maxResults - total);
    if (matches.length === 0) continue;
    results.push({ messageIndex, messageId: message.id, role: message.role, matches });
    total += matches.length;
  }
  return results;
}
