import {
  listDirectories,
  listSessionFiles,
  statDirectory,
  statListedFile,
  type DirectoryStamp,
  type ListedFile,
  type ListingOptions,
} from "../discovery.js";

export interface DirCacheEntry {
  rootPath: string;
  files: ListedFile[];
  directories: DirectoryStamp[];
  computedAtMs: number;
}

// Directory mtimes this close to the listing time may hide a later change made
// within the same timestamp tick, so such listings are rebuilt.
const RACY_WINDOW_MS = 2000;

function entryKey(rootPath: string, options: ListingOptions): string {
  return `${rootPath}\u0000${options.includeGlobs.join("\u0000")}\u0000${options.deep}`;
}

/**
 * Recursive session-file listings per root. A listing is rebuilt when the root or
 * any directory under it changes mtime, when a directory was modified just before
 * the listing was taken, or when a listed file has gone. Otherwise
 * the listed files are re-stat'ed so sizes and mtimes stay current.
 */
export class DirectoryListingCache {
  private readonly entries = new Map<string, DirCacheEntry>();

  async list(rootPath: string, options: ListingOptions): Promise<ListedFile[]> {
    const key = entryKey(rootPath, options);
    const entry = this.entries.get(key);
    if (entry) {
      const refreshed = await this.revalidate(entry);
      if (refreshed) return refreshed.map((file) => ({ ...file }));
    }
    const rebuilt = await this.build(rootPath, options);
    if (rebuilt.directories.length === 0) {
      this.entries.delete(key);
      return [];
    }
    this.entries.set(key, rebuilt);
    return rebuilt.files.map((file) => ({ ...file }));
  }

  /** Forgets every listing of `rootPath`, or all listings. */
  invalidate(rootPath?: string): void {
    if (rootPath === undefined) {
      this.entries.clear();
      return;
    }
    for (const [key, entry] of [...this.entries]) {
      if (entry.rootPath === rootPath) this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  private async build(rootPath: string, options: ListingOptions): Promise<DirCacheEntry> {
    const computedAtMs = Date.now();
    const directories = await listDirectories(rootPath, options.deep);
    if (directories.length === 0) {
      return { rootPath, files: [], directories, computedAtMs };
    }
    const files = await listSessionFiles(rootPath, options);
    return { rootPath, files, directories, computedAtMs };
  }

  private async revalidate(entry: DirCacheEntry): Promise<ListedFile[] | null> {
    for (const dir of entry.directories) {
      const current = await statDirectory(dir.path);
      if (!current || current.mtimeMs !== dir.mtimeMs) return null;
      if (current.mtimeMs >= entry.computedAtMs - RACY_WINDOW_MS) return null;
    }

    const files: ListedFile[] = [];
    for (const file of entry.files) {
      const current = await statListedFile(file.path);
      if (!current) return null;
      files.push(current);
    }
    files.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
    entry.files = files;
    return files;
  }
}
