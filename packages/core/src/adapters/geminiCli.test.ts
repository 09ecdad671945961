import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { FormatError, NotFoundError } from "../errors.js";
import { asArray, asRecord } from "../utils.js";
import { GeminiCliAdapter, parseGeminiDocument, projectHash } from "./geminiCli.js";

const PROJECT = "/test/project";
const FIXTURE = fileURLToPath(new URL("./__fixtures__/gemini/valid-session.json", import.meta.url));

async function writeChat(content: string, project = PROJECT): Promise<{ root: string; filePath: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "sessionscope-gemini-"));
  const chats = path.join(root, projectHash(project), "chats");
  await mkdir(chats, { recursive: true });
  const filePath = path.join(chats, "session-2026-01-15T10-00-test-001.json");
  await writeFile(filePath, content, "utf8");
  return { root, filePath };
}

async function fixtureText(): Promise<string> {
  return readFile(FIXTURE, "utf8");
}

describe("projectHash", () => {
  it("is the lowercase hex sha-256 of the path", () => {
    expect(projectHash(PROJECT)).toMatch(/^[0-9a-f]{64}$/);
    expect(projectHash(PROJECT)).not.toBe(projectHash(`${PROJECT}/`));
  });
});

describe("parseGeminiDocument", () => {
  it("drops info messages and maps gemini turns to the assistant", async () => {
    const document = parseGeminiDocument(await fixtureText(), FIXTURE);

    expect(document.sessionId).toBe("test-session-001");
    expect(document.projectHash).toBe("abc123def456");
    expect(document.messages.map((message) => message.role)).toEqual(["user", "assistant", "user", "assistant"]);
  });

  it("maps unknown message types to system", () => {
    const document = parseGeminiDocument(
      JSON.stringify({ sessionId: "s", messages: [{ id: "m1", type: "error", content: "quota exceeded" }] }),
      "chat.json",
    );

    expect(document.messages[0]?.role).toBe("system");
  });

  it("rejects invalid JSON and non-object documents", () => {
    expect(() => parseGeminiDocument("{not json", "chat.json")).toThrow(FormatError);
    expect(() => parseGeminiDocument("[]", "chat.json")).toThrow(FormatError);
    expect(() => parseGeminiDocument('{"messages": 3}', "chat.json")).toThrow(FormatError);
  });
});

describe("GeminiCliAdapter", () => {
  it("lists the chat under the project's hash directory", async () => {
    const { root, filePath } = await writeChat(await fixtureText());
    const adapter = new GeminiCliAdapter({ root });

    const sessions = await adapter.sessions(PROJECT);

    expect(sessions).toHaveLength(1);
    expect(sessions[0]).toMatchObject({
      id: "test-session-001",
      adapterId: "gemini-cli",
      adapterName: "Gemini CLI",
      adapterIcon: "✦",
      title: "Read the config loader",
      projectPath: PROJECT,
      messageCount: 4,
      totalInputTokens: 2700,
      totalOutputTokens: 180,
      cacheReadTokens: 1200,
      cacheWriteTokens: 0,
      primaryModel: "gemini-3-flash-preview",
      startTimeMs: Date.parse("2026-01-15T10:00:00.000Z"),
      lastUpdatedMs: Date.parse("2026-01-15T10:05:00.000Z"),
      filePath,
    });
  });

  it("returns messages in order with thoughts and tool output", async () => {
    const { root } = await writeChat(await fixtureText());
    const adapter = new GeminiCliAdapter({ root });

    const messages = await adapter.messages("test-session-001");

    expect(messages).toHaveLength(4);
    expect(messages.map((message) => message.role)).toEqual(["user", "assistant", "user", "assistant"]);
    expect(messages[1]?.thinkingBlocks).toEqual([
      { content: "Planning: Find the loader first", timestampMs: Date.parse("2026-01-15T10:00:30.000Z") },
    ]);
    expect(messages[3]?.toolUses).toEqual([
      {
        id: "read_file-1",
        name: "read_file",
        input: '{"absolute_path":"/test/project/config.ts"}',
        output: "export const port = 8080;",
        isError: false,
      },
    ]);
  });

  it("reports usage with thought tokens billed as output", async () => {
    const { root } = await writeChat(await fixtureText());
    const adapter = new GeminiCliAdapter({ root });

    const usage = await adapter.usage("test-session-001");

    expect(usage).toMatchObject({ messageCount: 4, inputTokens: 2700, outputTokens: 180, cacheReadTokens: 1200 });
  });

  it("ignores chats of other projects", async () => {
    const { root } = await writeChat(await fixtureText(), "/test/other");
    const adapter = new GeminiCliAdapter({ root });

    expect(await adapter.sessions(PROJECT)).toEqual([]);
    expect(await adapter.detect(PROJECT)).toBe(false);
    expect(await adapter.detect("/test/other")).toBe(true);
  });

  it("surfaces a corrupt chat file as a format error", async () => {
    const { root } = await writeChat('{"sessionId": "broken", "messages": [');
    const adapter = new GeminiCliAdapter({ root });

    await expect(adapter.sessions(PROJECT)).rejects.toBeInstanceOf(FormatError);
  });

  it("sees a rewritten chat on the next listing", async () => {
    const base = asRecord(JSON.parse(await fixtureText()));
    const { root, filePath } = await writeChat(
      JSON.stringify({ ...base, messages: asArray(base.messages).slice(0, 2) }),
    );
    const adapter = new GeminiCliAdapter({ root });
    const [before] = await adapter.sessions(PROJECT);

    await writeFile(filePath, JSON.stringify(base), "utf8");
    const [after] = await adapter.sessions(PROJECT);

    expect(before?.messageCount).toBe(2);
    expect(after?.messageCount).toBe(4);
  });

  it("forgets a session whose file was deleted", async () => {
    const { root, filePath } = await writeChat(await fixtureText());
    const adapter = new GeminiCliAdapter({ root });
    await adapter.sessions(PROJECT);

    await rm(filePath);

    await expect(adapter.messages("test-session-001")).rejects.toBeInstanceOf(NotFoundError);
    expect(await adapter.sessions(PROJECT)).toEqual([]);
  });
});
