import type {
  AdapterCapability,
  AdapterId,
  AppConfig,
  Message,
  MessageMatch,
  SearchOptions,
  Session,
  SessionUsage,
} from "@sessionscope/contracts";
import type { BufferPool } from "../jsonl/bufferPool.js";
import type { CoreLogger } from "../logger.js";

export interface AdapterCallOptions {
  signal?: AbortSignal;
}

export interface SessionAdapter {
  readonly id: AdapterId;
  readonly name: string;
  readonly icon: string;
  readonly root: string;

  capabilities(): ReadonlySet<AdapterCapability>;
  /** Cheap check for at least one session file that could belong to the project. */
  detect(projectPath: string, options?: AdapterCallOptions): Promise<boolean>;
  /** Sessions of the project, newest first. */
  sessions(projectPath: string, options?: AdapterCallOptions): Promise<Session[]>;
  messages(sessionId: string, options?: AdapterCallOptions): Promise<Message[]>;
  usage(sessionId: string, options?: AdapterCallOptions): Promise<SessionUsage>;
  searchMessages(sessionId: string, query: string, options?: SearchOptions & AdapterCallOptions): Promise<MessageMatch[]>;
}

export interface AdapterOptions {
  /** Overrides the vendor's default session root. */
  root?: string;
  config?: AppConfig;
  logger?: CoreLogger;
  bufferPool?: BufferPool;
  /** Clock used for liveness; defaults to Date.now. */
  now?: () => number;
}
