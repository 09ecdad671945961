import { appendFile, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { NotFoundError } from "../errors.js";
import { fileChanged, MetadataCache } from "./metaCache.js";

const STAMP = { sizeBytes: 10, mtimeMs: 1000 };

describe("MetadataCache", () => {
  it("serves a stored value only while the stamp matches", () => {
    const cache = new MetadataCache<{ count: number }>();
    cache.set("/a.jsonl", { count: 1 }, STAMP);

    expect(cache.get("/a.jsonl", STAMP)).toEqual({ count: 1 });
    expect(cache.get("/a.jsonl", { sizeBytes: 11, mtimeMs: 1000 })).toBeUndefined();
    expect(cache.get("/a.jsonl", { sizeBytes: 10, mtimeMs: 1001 })).toBeUndefined();
  });

  it("hands out copies", () => {
    const cache = new MetadataCache<{ count: number }>();
    cache.set("/a.jsonl", { count: 1 }, STAMP);

    const first = cache.get("/a.jsonl", STAMP);
    if (first) first.count = 99;

    expect(cache.get("/a.jsonl", STAMP)).toEqual({ count: 1 });
  });

  it("shares one computation between concurrent callers", async () => {
    const cache = new MetadataCache<string>();
    let release: (value: { value: string }) => void = () => undefined;
    const compute = vi.fn(
      () =>
        new Promise<{ value: string }>((resolve) => {
          release = resolve;
        }),
    );

    const first = cache.getOrCompute("/a.jsonl", STAMP, compute);
    const second = cache.getOrCompute("/a.jsonl", STAMP, compute);
    release({ value: "parsed" });

    expect(await Promise.all([first, second])).toEqual(["parsed", "parsed"]);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.peek("/a.jsonl")).toEqual({ value: "parsed", sizeBytes: 10, mtimeMs: 1000, offset: 10 });
  });

  it("does not store failed computations", async () => {
    const cache = new MetadataCache<string>();

    await expect(
      cache.getOrCompute("/a.jsonl", STAMP, () => Promise.reject(new Error("read failed"))),
    ).rejects.toThrow("read failed");

    expect(cache.size).toBe(0);
    expect(await cache.getOrCompute("/a.jsonl", STAMP, async () => ({ value: "ok" }))).toBe("ok");
  });

  it("passes the previous entry to the next computation and keeps its offset", async () => {
    const cache = new MetadataCache<number>();
    await cache.getOrCompute("/a.jsonl", STAMP, async () => ({ value: 1, offset: 8 }));
    const grown = { sizeBytes: 20, mtimeMs: 2000 };

    const compute = vi.fn(async (previous: { value: number; offset: number } | undefined) => ({
      value: (previous?.value ?? 0) + 1,
      offset: 20,
    }));
    const value = await cache.getOrCompute("/a.jsonl", grown, compute);

    expect(value).toBe(2);
    expect(compute).toHaveBeenCalledWith({ value: 1, sizeBytes: 10, mtimeMs: 1000, offset: 8 });
  });

  it("reports the stamp of a stored entry", () => {
    const cache = new MetadataCache<number>();
    cache.set("/a", 1, STAMP, 4);

    expect(cache.stampOf("/a")).toEqual(STAMP);
    expect(cache.stampOf("/b")).toBeUndefined();
  });

  it("evicts the least recently used entry when bounded", () => {
    const cache = new MetadataCache<number>(2);
    cache.set("/a", 1, STAMP);
    cache.set("/b", 2, STAMP);
    cache.get("/a", STAMP);
    cache.set("/c", 3, STAMP);

    expect(cache.size).toBe(2);
    expect(cache.peek("/b")).toBeUndefined();
    expect(cache.get("/a", STAMP)).toBe(1);
    expect(cache.get("/c", STAMP)).toBe(3);
  });

  it("drops entries by predicate or changed stamp", () => {
    const cache = new MetadataCache<number>();
    cache.set("/root/a", 1, STAMP);
    cache.set("/root/b", 2, STAMP);
    cache.set("/other/c", 3, STAMP);

    expect(cache.deleteIf((filePath) => filePath.startsWith("/root/"))).toBe(2);
    expect(cache.invalidateIfChanged("/other/c", STAMP)).toBe(false);
    expect(cache.invalidateIfChanged("/other/c", { sizeBytes: 12, mtimeMs: 1000 })).toBe(true);
    expect(cache.size).toBe(0);
  });
});

describe("fileChanged", () => {
  it("reports growth and rejects once the file is gone", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "sessionscope-meta-"));
    const filePath = path.join(dir, "s.jsonl");
    await writeFile(filePath, "{}\n", "utf8");
    const first = await fileChanged(filePath, { sizeBytes: 0, mtimeMs: 0 });

    expect(first.changed).toBe(true);
    expect(await fileChanged(filePath, first.current)).toMatchObject({ changed: false, grew: false });

    await appendFile(filePath, "{}\n");
    const second = await fileChanged(filePath, first.current);
    expect(second).toMatchObject({ changed: true, grew: true, current: { sizeBytes: 6 } });

    await rm(filePath);
    await expect(fileChanged(filePath, second.current)).rejects.toBeInstanceOf(NotFoundError);
  });
});
