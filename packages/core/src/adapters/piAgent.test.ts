import { appendFile, mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { modelCost } from "../pricing.js";
import { decodePiRecord, PiAgentAdapter, projectDirName, sessionIdFromPiFileName } from "./piAgent.js";

const PROJECT = "/test/project";
const MODEL = "claude-sonnet-4-5";

function at(second: number): string {
  return `2026-02-01T00:00:${String(second).padStart(2, "0")}.000Z`;
}

function header(id: string, cwd: string): Record<string, unknown> {
  return { type: "session", version: 3, id, timestamp: at(0), cwd };
}

function piMessage(id: string, second: number, message: Record<string, unknown>): Record<string, unknown> {
  return { type: "message", id, timestamp: at(second), message };
}

const SESSION = [
  header("test-session-1", PROJECT),
  { type: "model_change", id: "mc1", timestamp: at(0), provider: "anthropic", modelId: MODEL },
  piMessage("m1", 1, { role: "user", content: [{ type: "text", text: "what files are here?" }] }),
  piMessage("m2", 2, {
    role: "assistant",
    content: [
      { type: "thinking", thinking: "List the directory" },
      { type: "toolCall", id: "call_1", name: "bash", arguments: { command: "ls" } },
    ],
    usage: { input: 100, output: 20, cacheRead: 0, cacheWrite: 0, cost: { total: 0.01 } },
  }),
  piMessage("m3", 3, {
    role: "toolResult",
    toolCallId: "call_1",
    toolName: "bash",
    content: [{ type: "text", text: "file1.ts\nfile2.ts\nfile3.ts" }],
    isError: false,
  }),
  piMessage("m4", 4, {
    role: "assistant",
    content: [{ type: "text", text: "There are three files." }],
    usage: { input: 150, output: 30, cacheRead: 50, cacheWrite: 0 },
  }),
];

async function writeSessions(
  files: Array<{ dir: string; name: string; records: Array<Record<string, unknown>> }>,
): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), "sessionscope-pi-"));
  for (const file of files) {
    await mkdir(path.join(root, file.dir), { recursive: true });
    const body = `${file.records.map((record) => JSON.stringify(record)).join("\n")}\n`;
    await writeFile(path.join(root, file.dir, file.name), body, "utf8");
  }
  return root;
}

const MAIN_FILE = { dir: "--test-project--", name: "2026-02-01T00-00-00Z_test-session-1.jsonl", records: SESSION };

describe("projectDirName", () => {
  it.each([
    ["/home/user/project", "--home-user-project--"],
    ["/home/user/my-app", "--home-user-my-app--"],
    ["/", "----"],
  ])("encodes %s as %s", (input, expected) => {
    expect(projectDirName(input)).toBe(expected);
  });
});

describe("sessionIdFromPiFileName", () => {
  it("takes the part after the timestamp", () => {
    expect(sessionIdFromPiFileName("/x/2026-02-01T00-00-00Z_abc-123.jsonl")).toBe("abc-123");
  });
});

describe("decodePiRecord", () => {
  it("decodes tool results separately from turns", () => {
    const record = SESSION[4];
    expect(record && decodePiRecord(record)).toEqual({
      kind: "tool_result",
      timestampMs: Date.parse(at(3)),
      toolCallId: "call_1",
      output: "file1.ts\nfile2.ts\nfile3.ts",
      isError: false,
    });
  });
});

describe("PiAgentAdapter", () => {
  it("counts user and assistant turns but not tool results", async () => {
    const root = await writeSessions([MAIN_FILE]);
    const adapter = new PiAgentAdapter({ root });

    const [session] = await adapter.sessions(PROJECT);

    expect(session).toMatchObject({
      id: "test-session-1",
      adapterId: "pi-agent",
      adapterName: "Pi Agent",
      adapterIcon: "π",
      messageCount: 3,
      totalInputTokens: 250,
      totalOutputTokens: 50,
      cacheReadTokens: 50,
      primaryModel: MODEL,
      title: "what files are here?",
    });
  });

  it("prefers the recorded cost and prices turns without one", async () => {
    const root = await writeSessions([MAIN_FILE]);
    const adapter = new PiAgentAdapter({ root });

    const [session] = await adapter.sessions(PROJECT);

    const expected = 0.01 + modelCost(MODEL, { inputTokens: 150, outputTokens: 30, cacheReadTokens: 50 });
    expect(session?.estCostUsd).toBeCloseTo(expected, 5);
  });

  it("links tool results to the assistant turn that called the tool", async () => {
    const root = await writeSessions([MAIN_FILE]);
    const adapter = new PiAgentAdapter({ root });

    const messages = await adapter.messages("test-session-1");

    expect(messages.map((message) => message.role)).toEqual(["user", "assistant", "assistant"]);
    expect(messages[0]?.content).toBe("what files are here?");
    expect(messages[1]?.model).toBe(MODEL);
    expect(messages[1]?.thinkingBlocks).toEqual([{ content: "List the directory", timestampMs: Date.parse(at(2)) }]);
    expect(messages[1]?.toolUses).toEqual([
      { id: "call_1", name: "bash", input: '{"command":"ls"}', output: "file1.ts\nfile2.ts\nfile3.ts", isError: false },
    ]);
    expect(messages[2]?.content).toBe("There are three files.");
  });

  it("reports transcript usage", async () => {
    const root = await writeSessions([MAIN_FILE]);
    const adapter = new PiAgentAdapter({ root });

    const usage = await adapter.usage("test-session-1");

    expect(usage).toMatchObject({ messageCount: 3, inputTokens: 250, outputTokens: 50, cacheReadTokens: 50 });
  });

  it("never lowers usage counters when turns are appended", async () => {
    const root = await writeSessions([{ ...MAIN_FILE, records: SESSION.slice(0, 4) }]);
    const adapter = new PiAgentAdapter({ root });
    const before = await adapter.usage("test-session-1");

    const appended = SESSION.slice(4).map((record) => JSON.stringify(record));
    await appendFile(path.join(root, MAIN_FILE.dir, MAIN_FILE.name), `${appended.join("\n")}\n`);
    const after = await adapter.usage("test-session-1");

    expect(before).toMatchObject({ inputTokens: 100, outputTokens: 20, cacheReadTokens: 0 });
    expect(after.inputTokens).toBeGreaterThanOrEqual(before.inputTokens);
    expect(after.outputTokens).toBeGreaterThanOrEqual(before.outputTokens);
    expect(after.cacheReadTokens).toBeGreaterThanOrEqual(before.cacheReadTokens);
    expect(after.cacheWriteTokens).toBeGreaterThanOrEqual(before.cacheWriteTokens);
    expect(after).toMatchObject({ inputTokens: 250, outputTokens: 50, cacheReadTokens: 50 });
  });

  it("includes sessions started in subdirectories of the project", async () => {
    const root = await writeSessions([
      MAIN_FILE,
      {
        dir: "--test-project-src--",
        name: "2026-02-01T00-00-05Z_sub-1.jsonl",
        records: [header("sub-1", `${PROJECT}/src`), piMessage("s1", 1, { role: "user", content: "hi" })],
      },
      {
        dir: "--test-project-other--",
        name: "2026-02-01T00-00-06Z_other-1.jsonl",
        records: [header("other-1", `${PROJECT}-other`), piMessage("o1", 1, { role: "user", content: "hi" })],
      },
    ]);
    const adapter = new PiAgentAdapter({ root });

    const sessions = await adapter.sessions(PROJECT);

    expect(sessions.map((session) => session.id)).toEqual(["test-session-1", "sub-1"]);
  });

  it("detects nothing when the sessions directory is missing", async () => {
    const adapter = new PiAgentAdapter({ root: path.join(os.tmpdir(), "sessionscope-no-pi-root") });

    expect(await adapter.detect(PROJECT)).toBe(false);
  });
});
