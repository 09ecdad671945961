import { stat } from "node:fs/promises";
import { toFsError } from "../errors.js";

export interface FileStamp {
  sizeBytes: number;
  mtimeMs: number;
}

export interface MetaCacheEntry<T> extends FileStamp {
  value: T;
  /** Byte offset up to which `value` reflects the file. */
  offset: number;
}

export interface ComputedValue<T> {
  value: T;
  offset?: number;
}

interface Inflight<T> {
  stampKey: string;
  promise: Promise<T>;
}

function stampKey(stamp: FileStamp): string {
  return `${stamp.sizeBytes}:${stamp.mtimeMs}`;
}

function sameStamp(a: FileStamp, b: FileStamp): boolean {
  return a.sizeBytes === b.sizeBytes && a.mtimeMs === b.mtimeMs;
}

/**
 * Per-file summaries keyed by path and validated by (size, mtime). Values are
 * copied in and out. Concurrent computations for the same path and stamp share
 * one promise, and only successful computations are stored.
 */
export class MetadataCache<T> {
  private readonly entries = new Map<string, MetaCacheEntry<T>>();
  private readonly inflight = new Map<string, Inflight<T>>();

  /** `maxEntries` of 0 keeps every entry; otherwise least recently used entries are evicted. */
  constructor(private readonly maxEntries = 0) {}

  get size(): number {
    return this.entries.size;
  }

  get(filePath: string, stamp: FileStamp): T | undefined {
    const entry = this.entries.get(filePath);
    if (!entry || !sameStamp(entry, stamp)) return undefined;
    this.touch(filePath, entry);
    return structuredClone(entry.value);
  }

  /** Size and mtime the stored entry was computed for, without copying its value. */
  stampOf(filePath: string): FileStamp | undefined {
    const entry = this.entries.get(filePath);
    return entry ? { sizeBytes: entry.sizeBytes, mtimeMs: entry.mtimeMs } : undefined;
  }

  /** The stored entry regardless of stamp, used to resume from its offset. */
  peek(filePath: string): MetaCacheEntry<T> | undefined {
    const entry = this.entries.get(filePath);
    return entry ? structuredClone(entry) : undefined;
  }

  set(filePath: string, value: T, stamp: FileStamp, offset = 0): void {
    this.entries.delete(filePath);
    this.entries.set(filePath, {
      value: structuredClone(value),
      sizeBytes: stamp.sizeBytes,
      mtimeMs: stamp.mtimeMs,
      offset,
    });
    this.evict();
  }

  delete(filePath: string): boolean {
    return this.entries.delete(filePath);
  }

  deleteIf(predicate: (filePath: string, entry: Readonly<MetaCacheEntry<T>>) => boolean): number {
    let removed = 0;
    for (const [filePath, entry] of [...this.entries]) {
      if (predicate(filePath, entry)) {
        this.entries.delete(filePath);
        removed += 1;
      }
    }
    return removed;
  }

  /** Drops the entry when the file's current stamp differs from the stored one. */
  invalidateIfChanged(filePath: string, stamp: FileStamp): boolean {
    const entry = this.entries.get(filePath);
    if (!entry || sameStamp(entry, stamp)) return false;
    this.entries.delete(filePath);
    return true;
  }

  async getOrCompute(
    filePath: string,
    stamp: FileStamp,
    compute: (previous: MetaCacheEntry<T> | undefined) => Promise<ComputedValue<T>>,
  ): Promise<T> {
    const cached = this.get(filePath, stamp);
    if (cached !== undefined) return cached;

    const key = stampKey(stamp);
    const pending = this.inflight.get(filePath);
    if (pending && pending.stampKey === key) {
      return structuredClone(await pending.promise);
    }

    const record: Inflight<T> = {
      stampKey: key,
      promise: compute(this.peek(filePath)).then((computed) => {
        if (this.inflight.get(filePath) === record) {
          this.set(filePath, computed.value, stamp, computed.offset ?? stamp.sizeBytes);
        }
        return computed.value;
      }),
    };
    this.inflight.set(filePath, record);
    try {
      return structuredClone(await record.promise);
    } finally {
      if (this.inflight.get(filePath) === record) {
        this.inflight.delete(filePath);
      }
    }
  }

  private touch(filePath: string, entry: MetaCacheEntry<T>): void {
    if (this.maxEntries <= 0) return;
    this.entries.delete(filePath);
    this.entries.set(filePath, entry);
  }

  private evict(): void {
    if (this.maxEntries <= 0) return;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}

export interface FileChange {
  changed: boolean;
  /** Changed, and now larger than before. */
  grew: boolean;
  current: FileStamp;
}

/** Compares a file on disk against a known stamp. Rejects with NotFoundError when it is gone. */
export async function fileChanged(filePath: string, known: FileStamp): Promise<FileChange> {
  let current: FileStamp;
  try {
    const fileStat = await stat(filePath);
    current = { sizeBytes: fileStat.size, mtimeMs: fileStat.mtimeMs };
  } catch (error) {
    throw toFsError(error, "stat", filePath);
  }
  const changed = !sameStamp(current, known);
  return { changed, grew: changed && current.sizeBytes > known.sizeBytes, current };
}
