/** Maps session IDs to the files they were read from. Owned by one adapter. */
export class SessionIndex {
  private readonly paths = new Map<string, string>();

  set(sessionId: string, filePath: string): void {
    if (!sessionId) return;
    this.paths.set(sessionId, filePath);
  }

  get(sessionId: string): string | undefined {
    return this.paths.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.paths.has(sessionId);
  }

  delete(sessionId: string): boolean {
    return this.paths.delete(sessionId);
  }

  /** Removes every ID that points at `filePath`. */
  deletePath(filePath: string): number {
    let removed = 0;
    for (const [sessionId, indexed] of [...this.paths]) {
      if (indexed === filePath) {
        this.paths.delete(sessionId);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.paths.size;
  }
}
