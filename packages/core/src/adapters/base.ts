import type {
  AdapterCapability,
  AdapterId,
  AppConfig,
  Message,
  MessageMatch,
  SearchOptions,
  Session,
  SessionFileSummary,
  SessionUsage,
  TokenUsage,
} from "@sessionscope/contracts";
import { DirectoryListingCache } from "../cache/dirCache.js";
import { MetadataCache, type ComputedValue, type MetaCacheEntry } from "../cache/metaCache.js";
import { throwIfCancelled } from "../cancellation.js";
import { DEFAULT_CONFIG } from "../defaults.js";
import { statListedFile, type ListedFile, type ListingOptions } from "../discovery.js";
import { NotFoundError, UnsupportedError } from "../errors.js";
import { ScannerBufferPool, sharedScannerBufferPool } from "../jsonl/bufferPool.js";
import type { ReaderOptions } from "../jsonl/readers.js";
import { silentLogger, type CoreLogger } from "../logger.js";
import { totalTokens } from "../metrics.js";
import { cleanPath, ResolvedProjectPath } from "../projectPath.js";
import { searchMessageList } from "../search.js";
import { defaultParseConcurrency, Semaphore } from "../semaphore.js";
import { SessionIndex } from "../sessionIndex.js";
import type { JsonlFoldOptions } from "./common.js";
import { extractSessionOrigin, sessionTitle } from "./titles.js";
import type { AdapterCallOptions, AdapterOptions, SessionAdapter } from "./types.js";

export const ALL_CAPABILITIES: readonly AdapterCapability[] = ["sessions", "messages", "usage", "watch"];

export interface ListingRoot {
  path: string;
  listing: ListingOptions;
}

/** What the metadata cache keeps per file: the summary plus whatever a later resume needs. */
export interface CachedSummary<S> {
  summary: SessionFileSummary;
  state: S;
}

export interface SessionTranscript {
  sessionId: string;
  messages: Message[];
  usage: TokenUsage;
  estCostUsd: number;
}

export function compareSessions(a: Session, b: Session): number {
  return b.lastUpdatedMs - a.lastUpdatedMs || b.startTimeMs - a.startTimeMs || a.id.localeCompare(b.id);
}

/**
 * Shared flow for adapters whose sessions are files under one root: listing through
 * the directory cache, per-file summaries through the metadata cache, project
 * filtering, and ID lookups through the session index.
 */
export abstract class FileSessionAdapter<S> implements SessionAdapter {
  abstract readonly name: string;
  abstract readonly icon: string;
  readonly root: string;

  protected readonly config: AppConfig;
  protected readonly logger: CoreLogger;
  protected readonly readerOptions: ReaderOptions;
  protected readonly dirCache = new DirectoryListingCache();
  protected readonly metaCache: MetadataCache<CachedSummary<S>>;
  protected readonly index = new SessionIndex();
  /** Files seen to grow between two observations. */
  private readonly growing = new Set<string>();
  protected readonly supported: ReadonlySet<AdapterCapability> = new Set(ALL_CAPABILITIES);
  private readonly semaphore: Semaphore;
  private readonly now: () => number;

  protected constructor(
    readonly id: AdapterId,
    options: AdapterOptions,
  ) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.root = cleanPath(options.root ?? this.config.adapters[id].root);
    this.logger = options.logger ?? silentLogger;
    const pool =
      options.bufferPool ??
      (this.config.reader.scannerBufferBytes === sharedScannerBufferPool.bufferBytes
        ? sharedScannerBufferPool
        : new ScannerBufferPool(this.config.reader.scannerBufferBytes));
    this.readerOptions = { pool, maxLineBytes: this.config.reader.maxLineBytes };
    this.metaCache = new MetadataCache(this.config.cache.metadataMaxEntries);
    this.semaphore = new Semaphore(defaultParseConcurrency(this.config.scan.parseConcurrency));
    this.now = options.now ?? Date.now;
  }

  /** Directories that may hold sessions of `project`. */
  protected abstract projectRoots(project: ResolvedProjectPath): Promise<ListingRoot[]>;

  /** Every session directory, for rebuilding the index. */
  protected abstract allRoots(): ListingRoot[];

  protected abstract summarizeFile(
    file: ListedFile,
    previous: MetaCacheEntry<CachedSummary<S>> | undefined,
  ): Promise<ComputedValue<CachedSummary<S>>>;

  protected abstract readTranscript(filePath: string): Promise<SessionTranscript>;

  protected belongsToProject(summary: SessionFileSummary, project: ResolvedProjectPath): boolean {
    return project.matchesCwd(summary.cwd);
  }

  protected get foldOptions(): JsonlFoldOptions {
    return { tolerance: this.config.tolerance, reader: this.readerOptions, logger: this.logger };
  }

  capabilities(): ReadonlySet<AdapterCapability> {
    return new Set(this.supported);
  }

  async detect(projectPath: string, options: AdapterCallOptions = {}): Promise<boolean> {
    const project = new ResolvedProjectPath(projectPath);
    for (const root of await this.projectRoots(project)) {
      throwIfCancelled(options.signal);
      const files = await this.dirCache.list(root.path, root.listing);
      for (const file of files) {
        throwIfCancelled(options.signal);
        const summary = await this.summaryFor(file);
        if (summary && this.belongsToProject(summary, project)) {
          this.index.set(summary.sessionId, summary.path);
          return true;
        }
      }
    }
    return false;
  }

  async sessions(projectPath: string, options: AdapterCallOptions = {}): Promise<Session[]> {
    this.requireCapability("sessions");
    const project = new ResolvedProjectPath(projectPath);
    const files = await this.listRoots(await this.projectRoots(project), options.signal);
    const summarized = await this.summarizeAll(files, options.signal);

    const sessions: Session[] = [];
    for (const { file, summary } of summarized) {
      if (!this.belongsToProject(summary, project)) continue;
      this.index.set(summary.sessionId, summary.path);
      sessions.push(this.toSession(summary, file, project));
    }
    return sessions.sort(compareSessions);
  }

  async messages(sessionId: string, options: AdapterCallOptions = {}): Promise<Message[]> {
    this.requireCapability("messages");
    const transcript = await this.transcriptFor(sessionId, options.signal);
    return transcript.messages;
  }

  async usage(sessionId: string, options: AdapterCallOptions = {}): Promise<SessionUsage> {
    this.requireCapability("usage");
    const transcript = await this.transcriptFor(sessionId, options.signal);
    return {
      sessionId,
      messageCount: transcript.messages.length,
      ...transcript.usage,
      totalTokens: totalTokens(transcript.usage),
      estCostUsd: transcript.estCostUsd,
    };
  }

  async searchMessages(
    sessionId: string,
    query: string,
    options: SearchOptions & AdapterCallOptions = {},
  ): Promise<MessageMatch[]> {
    const messages = await this.messages(sessionId, options);
    return searchMessageList(messages, query, options);
  }

  protected requireCapability(capability: AdapterCapability): void {
    if (!this.supported.has(capability)) {
      throw new UnsupportedError(`${this.name} does not support ${capability}`);
    }
  }

  /** Cached summary of `file`; null when the file vanished before it could be read. */
  protected async summaryFor(file: ListedFile): Promise<SessionFileSummary | null> {
    this.noteGrowth(file);
    try {
      const cached = await this.metaCache.getOrCompute(file.path, file, (previous) =>
        this.summarizeFile(file, previous),
      );
      return cached.summary;
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      this.metaCache.delete(file.path);
      this.index.deletePath(file.path);
      this.growing.delete(file.path);
      return null;
    }
  }

  private noteGrowth(file: ListedFile): void {
    const seen = this.metaCache.stampOf(file.path);
    if (!seen || (seen.sizeBytes === file.sizeBytes && seen.mtimeMs === file.mtimeMs)) return;
    if (file.sizeBytes > seen.sizeBytes) {
      this.growing.add(file.path);
    } else {
      this.growing.delete(file.path);
    }
  }

  private async listRoots(roots: ListingRoot[], signal: AbortSignal | undefined): Promise<ListedFile[]> {
    const files: ListedFile[] = [];
    for (const root of roots) {
      throwIfCancelled(signal);
      files.push(...(await this.dirCache.list(root.path, root.listing)));
    }
    return files;
  }

  private async summarizeAll(
    files: ListedFile[],
    signal: AbortSignal | undefined,
  ): Promise<Array<{ file: ListedFile; summary: SessionFileSummary }>> {
    const results = await Promise.all(
      files.map((file) =>
        this.semaphore.run(async () => {
          throwIfCancelled(signal);
          return { file, summary: await this.summaryFor(file) };
        }),
      ),
    );
    throwIfCancelled(signal);
    return results.flatMap(({ file, summary }) => (summary ? [{ file, summary }] : []));
  }

  private async transcriptFor(sessionId: string, signal: AbortSignal | undefined): Promise<SessionTranscript> {
    const filePath = await this.resolveSessionPath(sessionId, signal);
    throwIfCancelled(signal);
    return this.readTranscript(filePath);
  }

  /** Index lookup; unknown or stale IDs trigger a bounded re-scan before failing. */
  protected async resolveSessionPath(sessionId: string, signal: AbortSignal | undefined): Promise<string> {
    const indexed = this.index.get(sessionId);
    if (indexed) {
      if (await statListedFile(indexed)) return indexed;
      this.logger.debug("dropping stale session index entry", { adapter: this.id, sessionId, path: indexed });
      this.index.delete(sessionId);
      this.metaCache.delete(indexed);
      this.growing.delete(indexed);
    }

    await this.rebuildIndex(signal);
    const found = this.index.get(sessionId);
    if (found) return found;
    throw new NotFoundError(`${this.name} session ${sessionId} not found`);
  }

  private async rebuildIndex(signal: AbortSignal | undefined): Promise<void> {
    const files = await this.listRoots(this.allRoots(), signal);
    const recent = files
      .sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path))
      .slice(0, this.config.scan.rescanLimit);
    for (const { summary } of await this.summarizeAll(recent, signal)) {
      this.index.set(summary.sessionId, summary.path);
    }
  }

  protected toSession(summary: SessionFileSummary, file: ListedFile, project: ResolvedProjectPath): Session {
    const origin = extractSessionOrigin(summary.firstUserMessage);
    const startTimeMs = summary.startTimeMs ?? summary.lastUpdatedMs ?? file.mtimeMs;
    const lastUpdatedMs = Math.max(summary.lastUpdatedMs ?? file.mtimeMs, startTimeMs);
    return {
      id: summary.sessionId,
      adapterId: this.id,
      adapterName: this.name,
      adapterIcon: this.icon,
      title: sessionTitle(summary.firstUserMessage, summary.sessionId, this.config.titles.maxLength),
      projectPath: project.cleaned,
      startTimeMs,
      lastUpdatedMs,
      messageCount: summary.messageCount,
      totalInputTokens: summary.usage.inputTokens,
      totalOutputTokens: summary.usage.outputTokens,
      cacheReadTokens: summary.usage.cacheReadTokens,
      cacheWriteTokens: summary.usage.cacheWriteTokens,
      estCostUsd: summary.estCostUsd,
      primaryModel: summary.primaryModel,
      category: origin.category,
      cronJobName: origin.cronJobName,
      sourceChannel: origin.sourceChannel,
      filePath: summary.path,
      sizeBytes: file.sizeBytes,
      isLive: this.growing.has(file.path) && this.now() - file.mtimeMs <= this.config.scan.liveWindowMs,
    };
  }
}
