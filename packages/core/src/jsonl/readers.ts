import { open, type FileHandle } from "node:fs/promises";
import { toFsError } from "../errors.js";
import { DEFAULT_MAX_LINE_BYTES, sharedScannerBufferPool, type BufferPool } from "./bufferPool.js";
import { LineScanner } from "./lineScanner.js";

export interface ReaderOptions {
  pool?: BufferPool;
  maxLineBytes?: number;
}

async function openForRead(filePath: string): Promise<FileHandle> {
  try {
    return await open(filePath, "r");
  } catch (error) {
    throw toFsError(error, "open", filePath);
  }
}

/**
 * A finite, non-restartable sequence of JSONL lines over one open file. `next()`
 * resolves to null at end of input; `close()` releases the handle and the scanner
 * buffer and is safe to call more than once.
 */
export abstract class JsonlReader implements AsyncIterable<Buffer> {
  private closed = false;
  protected position: number;
  protected lastTerminated = true;
  protected lastLineStart: number;

  protected constructor(
    readonly path: string,
    private readonly handle: FileHandle,
    protected readonly scanner: LineScanner,
    startOffset: number,
  ) {
    this.position = startOffset;
    this.lastLineStart = startOffset;
  }

  /** Byte position immediately after the most recently yielded line. */
  get offset(): number {
    return this.position;
  }

  /** File offset where the most recently yielded line starts. */
  get lineStart(): number {
    return this.lastLineStart;
  }

  /** False when the last yielded line ran to end of file without a newline. */
  get lastLineTerminated(): boolean {
    return this.lastTerminated;
  }

  abstract next(): Promise<Buffer | null>;

  protected async scan(): Promise<Buffer | null> {
    const line = await this.scanner.next();
    if (!line) return null;
    this.lastLineStart = line.start;
    this.position = line.start + line.consumed;
    this.lastTerminated = line.terminated;
    return line.bytes;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.scanner.release();
    try {
      await this.handle.close();
    } catch (error) {
      throw toFsError(error, "close", this.path);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Buffer> {
    for (;;) {
      const line = await this.next();
      if (line === null) return;
      yield line;
    }
  }
}

interface OpenedScanner {
  handle: FileHandle;
  scanner: LineScanner;
}

async function openScanner(
  filePath: string,
  position: (handle: FileHandle) => Promise<number>,
  options: ReaderOptions,
): Promise<OpenedScanner & { start: number }> {
  const handle = await openForRead(filePath);
  try {
    const start = await position(handle);
    const scanner = new LineScanner(
      handle,
      filePath,
      start,
      options.pool ?? sharedScannerBufferPool,
      options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES,
    );
    return { handle, scanner, start };
  } catch (error) {
    await handle.close();
    throw toFsError(error, "open", filePath);
  }
}

async function fileSize(handle: FileHandle, filePath: string): Promise<number> {
  try {
    return (await handle.stat()).size;
  } catch (error) {
    throw toFsError(error, "stat", filePath);
  }
}

/** Reads lines from `startOffset`, which must be 0 or a line boundary. */
export class IncrementalReader extends JsonlReader {
  static async open(filePath: string, startOffset = 0, options: ReaderOptions = {}): Promise<IncrementalReader> {
    const opened = await openScanner(filePath, async () => Math.max(0, startOffset), options);
    return new IncrementalReader(filePath, opened.handle, opened.scanner, opened.start);
  }

  next(): Promise<Buffer | null> {
    return this.scan();
  }
}

/** Reads the complete lines inside the last `tailBytes` bytes of the file. */
export class TailReader extends JsonlReader {
  private skipFirst: boolean;

  private constructor(filePath: string, handle: FileHandle, scanner: LineScanner, start: number) {
    super(filePath, handle, scanner, start);
    this.skipFirst = start > 0;
  }

  static async open(filePath: string, tailBytes: number, options: ReaderOptions = {}): Promise<TailReader> {
    const opened = await openScanner(
      filePath,
      async (handle) => {
        const size = await fileSize(handle, filePath);
        return tailBytes > 0 ? Math.max(0, size - tailBytes) : size;
      },
      options,
    );
    return new TailReader(filePath, opened.handle, opened.scanner, opened.start);
  }

  async next(): Promise<Buffer | null> {
    if (this.skipFirst) {
      this.skipFirst = false;
      // the first line in the window may be cut
      const partial = await this.scan();
      if (partial === null) return null;
    }
    return this.scan();
  }
}

/** Reads at most the first `maxLines` lines. */
export class HeadReader extends JsonlReader {
  private count = 0;

  private constructor(
    filePath: string,
    handle: FileHandle,
    scanner: LineScanner,
    private readonly maxLines: number,
  ) {
    super(filePath, handle, scanner, 0);
  }

  static async open(filePath: string, maxLines: number, options: ReaderOptions = {}): Promise<HeadReader> {
    const opened = await openScanner(filePath, async () => 0, options);
    return new HeadReader(filePath, opened.handle, opened.scanner, maxLines);
  }

  get linesRead(): number {
    return this.count;
  }

  async next(): Promise<Buffer | null> {
    if (this.count >= this.maxLines) return null;
    const line = await this.scan();
    if (line !== null) this.count += 1;
    return line;
  }
}

/** Runs `fn` over an opened reader and closes it on every exit path. */
export async function withReader<R extends JsonlReader, T>(
  opening: Promise<R>,
  fn: (reader: R) => Promise<T>,
): Promise<T> {
  const reader = await opening;
  try {
    return await fn(reader);
  } finally {
    await reader.close();
  }
}

export async function collectLines(reader: JsonlReader): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of reader) {
    lines.push(line.toString("utf8"));
  }
  return lines;
}
