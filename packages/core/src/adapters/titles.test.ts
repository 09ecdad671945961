import { describe, expect, it } from "vitest";
import { extractSessionOrigin, sessionTitle, stripMessagePrefix, truncateTitle } from "./titles.js";

describe("extractSessionOrigin", () => {
  it("treats untagged messages as direct interactive sessions", () => {
    expect(extractSessionOrigin("Hello world")).toEqual({
      category: "interactive",
      cronJobName: "",
      sourceChannel: "direct",
    });
  });

  it("reads cron job names", () => {
    expect(extractSessionOrigin("[cron:abc123 daily-backup] Run backup")).toEqual({
      category: "cron",
      cronJobName: "daily-backup",
      sourceChannel: "",
    });
  });

  it("reads the chat channel", () => {
    expect(extractSessionOrigin("[Telegram User (@handle) id:123] Hi there")).toEqual({
      category: "interactive",
      cronJobName: "",
      sourceChannel: "telegram",
    });
  });

  it("recognizes system-initiated sessions", () => {
    expect(extractSessionOrigin("System: [something] message")).toEqual({
      category: "system",
      cronJobName: "",
      sourceChannel: "",
    });
  });
});

describe("stripMessagePrefix", () => {
  it("removes known tags", () => {
    expect(stripMessagePrefix("Hello world")).toBe("Hello world");
    expect(stripMessagePrefix("[Telegram User] Hello")).toBe("Hello");
    expect(stripMessagePrefix("[cron:abc job] Task")).toBe("Task");
    expect(stripMessagePrefix("System: [x] Message")).toBe("Message");
  });
});

describe("truncateTitle", () => {
  it("cuts long titles with an ellipsis", () => {
    expect(truncateTitle("short", 10)).toBe("short");
    expect(truncateTitle("this is a longer title", 10)).toBe("this is...");
  });

  it("collapses newlines and whitespace runs", () => {
    expect(truncateTitle("with\nnewline", 20)).toBe("with newline");
    expect(truncateTitle("  a \t\t b  ", 20)).toBe("a b");
  });
});

describe("sessionTitle", () => {
  it("falls back to the short session id", () => {
    expect(sessionTitle("", "0123456789abcdef", 50)).toBe("Session 01234567");
    expect(sessionTitle("[cron:x nightly] Rotate logs", "id", 50)).toBe("Rotate logs");
  });
});
