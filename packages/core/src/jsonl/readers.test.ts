import { appendFile, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { FormatError, NotFoundError } from "../errors.js";
import { ScannerBufferPool, UnpooledBuffers } from "./bufferPool.js";
import { collectLines, HeadReader, IncrementalReader, TailReader, withReader } from "./readers.js";

const FIVE_LINES = "line1\nline2\nline3\nline4\nline5\n";

async function writeTemp(content: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "sessionscope-readers-"));
  const filePath = path.join(dir, "session.jsonl");
  await writeFile(filePath, content, "utf8");
  return filePath;
}

describe("HeadReader", () => {
  it("stops after maxLines and reports the offset for hand-off", async () => {
    const filePath = await writeTemp(FIVE_LINES);
    const reader = await HeadReader.open(filePath, 3);
    try {
      expect(await collectLines(reader)).toEqual(["line1", "line2", "line3"]);
      expect(await reader.next()).toBeNull();
      expect(reader.offset).toBe(18);
      expect(reader.linesRead).toBe(3);
    } finally {
      await reader.close();
    }
  });

  it("yields every line when the file is shorter than maxLines", async () => {
    const filePath = await writeTemp("a\nb\n");
    const lines = await withReader(HeadReader.open(filePath, 20), collectLines);
    expect(lines).toEqual(["a", "b"]);
  });

  it("hands off to an IncrementalReader at its offset", async () => {
    const filePath = await writeTemp(FIVE_LINES);
    const offset = await withReader(HeadReader.open(filePath, 2), async (reader) => {
      await collectLines(reader);
      return reader.offset;
    });
    const rest = await withReader(IncrementalReader.open(filePath, offset), collectLines);
    expect(rest).toEqual(["line3", "line4", "line5"]);
  });
});

describe("TailReader", () => {
  it("discards the first line in the window", async () => {
    const filePath = await writeTemp(FIVE_LINES);
    const lines = await withReader(TailReader.open(filePath, 12), collectLines);
    expect(lines).toEqual(["line5"]);
  });

  it("discards a cut line and keeps the complete ones after it", async () => {
    const filePath = await writeTemp(FIVE_LINES);
    const lines = await withReader(TailReader.open(filePath, 15), collectLines);
    expect(lines).toEqual(["line4", "line5"]);
  });

  it("reads everything when the window covers the file", async () => {
    const filePath = await writeTemp(FIVE_LINES);
    const lines = await withReader(TailReader.open(filePath, 1000), collectLines);
    expect(lines).toEqual(["line1", "line2", "line3", "line4", "line5"]);
  });

  it("yields nothing when the window holds no newline before EOF", async () => {
    const filePath = await writeTemp(FIVE_LINES);
    const lines = await withReader(TailReader.open(filePath, 3), collectLines);
    expect(lines).toEqual([]);
  });
});

describe("IncrementalReader", () => {
  it("tracks the offset after each yielded line", async () => {
    const filePath = await writeTemp(FIVE_LINES);
    const reader = await IncrementalReader.open(filePath, 0);
    try {
      expect((await reader.next())?.toString()).toBe("line1");
      expect(reader.offset).toBe(6);
      expect((await reader.next())?.toString()).toBe("line2");
      expect(reader.offset).toBe(12);
    } finally {
      await reader.close();
    }
  });

  it("resumes from a prior offset after the file grows", async () => {
    const filePath = await writeTemp("one\ntwo\n");
    const first = await withReader(IncrementalReader.open(filePath, 0), async (reader) => ({
      lines: await collectLines(reader),
      offset: reader.offset,
    }));
    await appendFile(filePath, "three\nfour\n", "utf8");
    const resumed = await withReader(IncrementalReader.open(filePath, first.offset), collectLines);
    const whole = await withReader(IncrementalReader.open(filePath, 0), collectLines);
    expect([...first.lines, ...resumed]).toEqual(whole);
    expect(whole).toEqual(["one", "two", "three", "four"]);
  });

  it("yields an unterminated last line and flags it", async () => {
    const filePath = await writeTemp("done\npartial");
    const reader = await IncrementalReader.open(filePath, 0);
    try {
      await reader.next();
      expect(reader.lastLineTerminated).toBe(true);
      expect((await reader.next())?.toString()).toBe("partial");
      expect(reader.lastLineTerminated).toBe(false);
      expect(reader.offset).toBe(12);
      expect(reader.lineStart).toBe(5);
    } finally {
      await reader.close();
    }
  });

  it("strips carriage returns but counts them in the offset", async () => {
    const filePath = await writeTemp("a\r\nb\r\n");
    const reader = await IncrementalReader.open(filePath, 0);
    try {
      expect(await collectLines(reader)).toEqual(["a", "b"]);
      expect(reader.offset).toBe(6);
    } finally {
      await reader.close();
    }
  });

  it("grows past the pooled buffer for long lines", async () => {
    const longLine = "x".repeat(40);
    const filePath = await writeTemp(`${longLine}\nshort\n`);
    const lines = await withReader(
      IncrementalReader.open(filePath, 0, { pool: new UnpooledBuffers(8), maxLineBytes: 64 }),
      collectLines,
    );
    expect(lines).toEqual([longLine, "short"]);
  });

  it("rejects lines longer than the maximum with their offset", async () => {
    const filePath = await writeTemp(`ok\n${"y".repeat(30)}\n`);
    const reader = await IncrementalReader.open(filePath, 0, { pool: new UnpooledBuffers(8), maxLineBytes: 16 });
    try {
      await reader.next();
      const failure = await reader.next().catch((error: unknown) => error);
      expect(failure).toBeInstanceOf(FormatError);
      expect(failure).toMatchObject({ offset: 3 });
    } finally {
      await reader.close();
    }
  });

  it("returns its buffer to the pool on close", async () => {
    const pool = new ScannerBufferPool(16);
    const filePath = await writeTemp(FIVE_LINES);
    await withReader(IncrementalReader.open(filePath, 0, { pool }), collectLines);
    expect(pool.retained).toBe(1);
  });

  it("fails with NotFoundError for a missing file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "sessionscope-readers-"));
    await expect(IncrementalReader.open(path.join(dir, "missing.jsonl"), 0)).rejects.toBeInstanceOf(NotFoundError);
  });
});
