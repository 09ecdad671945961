import type { FileHandle } from "node:fs/promises";
import { FormatError, toFsError } from "../errors.js";
import type { BufferPool } from "./bufferPool.js";

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export interface ScannedLine {
  /** Line content without the newline (and without a trailing CR). */
  bytes: Buffer;
  /** File offset of the first byte of the line. */
  start: number;
  /** Bytes consumed from the file, newline included. */
  consumed: number;
  terminated: boolean;
}

/**
 * Splits a file into lines starting at a byte position, reading through a buffer
 * borrowed from a pool. The buffer grows up to the maximum line length; a longer
 * line is a FormatError.
 */
export class LineScanner {
  private buffer: Buffer;
  private pooled: Buffer | null;
  private start = 0;
  private end = 0;
  private eof = false;
  private readPosition: number;
  private lineStart: number;

  constructor(
    private readonly handle: FileHandle,
    private readonly filePath: string,
    position: number,
    private readonly pool: BufferPool,
    private readonly maxLineBytes: number,
  ) {
    this.pooled = pool.acquire();
    this.buffer = this.pooled;
    this.readPosition = position;
    this.lineStart = position;
  }

  async next(): Promise<ScannedLine | null> {
    for (;;) {
      const window = this.buffer.subarray(this.start, this.end);
      const newline = window.indexOf(NEWLINE);
      if (newline >= 0) {
        this.assertLineLength(newline);
        return this.take(newline, newline + 1, true);
      }
      this.assertLineLength(window.length);
      if (this.eof) {
        if (window.length === 0) return null;
        return this.take(window.length, window.length, false);
      }
      await this.fill();
    }
  }

  release(): void {
    if (this.pooled) {
      this.pool.release(this.pooled);
      this.pooled = null;
    }
  }

  private take(length: number, consumed: number, terminated: boolean): ScannedLine {
    let contentEnd = this.start + length;
    if (contentEnd > this.start && this.buffer[contentEnd - 1] === CARRIAGE_RETURN) {
      contentEnd -= 1;
    }
    const line: ScannedLine = {
      bytes: Buffer.from(this.buffer.subarray(this.start, contentEnd)),
      start: this.lineStart,
      consumed,
      terminated,
    };
    this.start += consumed;
    this.lineStart += consumed;
    return line;
  }

  private assertLineLength(length: number): void {
    if (length > this.maxLineBytes) {
      throw new FormatError(`line exceeds ${this.maxLineBytes} bytes`, this.filePath, this.lineStart);
    }
  }

  private async fill(): Promise<void> {
    if (this.start > 0) {
      this.buffer.copy(this.buffer, 0, this.start, this.end);
      this.end -= this.start;
      this.start = 0;
    }
    if (this.end === this.buffer.length) {
      const limit = this.maxLineBytes + 1;
      if (this.buffer.length >= limit) {
        throw new FormatError(`line exceeds ${this.maxLineBytes} bytes`, this.filePath, this.lineStart);
      }
      const grown = Buffer.allocUnsafe(Math.min(this.buffer.length * 2, limit));
      this.buffer.copy(grown, 0, 0, this.end);
      this.release();
      this.buffer = grown;
    }

    let bytesRead = 0;
    try {
      ({ bytesRead } = await this.handle.read(this.buffer, this.end, this.buffer.length - this.end, this.readPosition));
    } catch (error) {
      throw toFsError(error, "read", this.filePath);
    }
    if (bytesRead === 0) {
      this.eof = true;
      return;
    }
    this.end += bytesRead;
    this.readPosition += bytesRead;
  }
}
