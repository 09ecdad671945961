export const DEFAULT_SCANNER_BUFFER_BYTES = 1024 * 1024;
export const DEFAULT_MAX_LINE_BYTES = 10 * 1024 * 1024;

export interface BufferPool {
  readonly bufferBytes: number;
  acquire(): Buffer;
  release(buffer: Buffer): void;
}

/**
 * Free list of scanner buffers. Buffers of a foreign size are dropped on release,
 * and at most `maxRetained` buffers are kept.
 */
export class ScannerBufferPool implements BufferPool {
  private readonly free: Buffer[] = [];

  constructor(
    readonly bufferBytes = DEFAULT_SCANNER_BUFFER_BYTES,
    private readonly maxRetained = 8,
  ) {
    if (!Number.isInteger(bufferBytes) || bufferBytes < 1) {
      throw new Error("ScannerBufferPool bufferBytes must be a positive integer");
    }
  }

  acquire(): Buffer {
    return this.free.pop() ?? Buffer.allocUnsafe(this.bufferBytes);
  }

  release(buffer: Buffer): void {
    if (buffer.length !== this.bufferBytes) return;
    if (this.free.length >= this.maxRetained || this.free.includes(buffer)) return;
    this.free.push(buffer);
  }

  get retained(): number {
    return this.free.length;
  }
}

/** Allocates on every acquire and retains nothing. */
export class UnpooledBuffers implements BufferPool {
  constructor(readonly bufferBytes = DEFAULT_SCANNER_BUFFER_BYTES) {}

  acquire(): Buffer {
    return Buffer.allocUnsafe(this.bufferBytes);
  }

  release(_buffer: Buffer): void {}
}

export const sharedScannerBufferPool = new ScannerBufferPool();
