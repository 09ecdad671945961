import type { SessionCategory } from "@sessionscope/contracts";
import { shortId } from "../utils.js";

export interface SessionOrigin {
  category: SessionCategory;
  cronJobName: string;
  sourceChannel: string;
}

const CRON_PREFIX = /^\[cron:(\S+)\s+([^\]]+)\]/;
const CHANNEL_PREFIX = /^\[([A-Za-z][\w-]*) User\b[^\]]*\]/;
const SYSTEM_PREFIX = /^System:\s*(\[[^\]]*\]\s*)?/;
const BRACKET_PREFIX = /^\[[^\]]*\]\s*/;

/** Reads how a session was started from the tag on its first user message. */
export function extractSessionOrigin(text: string): SessionOrigin {
  const trimmed = text.trimStart();
  const cron = CRON_PREFIX.exec(trimmed);
  if (cron) {
    return { category: "cron", cronJobName: (cron[2] ?? "").trim(), sourceChannel: "" };
  }
  if (SYSTEM_PREFIX.test(trimmed)) {
    return { category: "system", cronJobName: "", sourceChannel: "" };
  }
  const channel = CHANNEL_PREFIX.exec(trimmed);
  if (channel) {
    return { category: "interactive", cronJobName: "", sourceChannel: (channel[1] ?? "").toLowerCase() };
  }
  return { category: "interactive", cronJobName: "", sourceChannel: "direct" };
}

export function stripMessagePrefix(text: string): string {
  const trimmed = text.trimStart();
  const system = SYSTEM_PREFIX.exec(trimmed);
  if (system) {
    return trimmed.slice(system[0].length).trim();
  }
  return trimmed.replace(BRACKET_PREFIX, "").trim();
}

export function truncateTitle(text: string, maxLength: number): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= maxLength) return collapsed;
  if (maxLength <= 3) return collapsed.slice(0, maxLength);
  return `${collapsed.slice(0, maxLength - 3).trimEnd()}...`;
}

export function sessionTitle(firstUserMessage: string, sessionId: string, maxLength: number): string {
  const title = truncateTitle(stripMessagePrefix(firstUserMessage), maxLength);
  return title || `Session ${shortId(sessionId)}`;
}
