export type SessionScopeErrorCode = "not_found" | "format" | "io" | "cancelled" | "unsupported" | "invalid_input";

export abstract class SessionScopeError extends Error {
  abstract readonly code: SessionScopeErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class NotFoundError extends SessionScopeError {
  readonly code = "not_found" as const;
}

export class FormatError extends SessionScopeError {
  readonly code = "format" as const;
  readonly path: string;
  /** Byte offset of the offending record, or -1 for whole-document failures. */
  readonly offset: number;

  constructor(message: string, path: string, offset = -1, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
    this.offset = offset;
  }
}

export class IoError extends SessionScopeError {
  readonly code = "io" as const;
}

export class CancelledError extends SessionScopeError {
  readonly code = "cancelled" as const;

  constructor(message = "operation cancelled", options?: ErrorOptions) {
    super(message, options);
  }
}

export class UnsupportedError extends SessionScopeError {
  readonly code = "unsupported" as const;
}

export class InvalidInputError extends SessionScopeError {
  readonly code = "invalid_input" as const;
}

export function isSessionScopeError(value: unknown): value is SessionScopeError {
  return value instanceof SessionScopeError;
}

function errnoCode(error: unknown): string {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "";
}

export function isMissingFileError(error: unknown): boolean {
  const code = errnoCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

/** Maps a filesystem failure onto NotFoundError or IoError; structured errors pass through. */
export function toFsError(error: unknown, action: string, filePath: string): SessionScopeError {
  if (isSessionScopeError(error)) return error;
  const detail = error instanceof Error ? error.message : String(error);
  if (isMissingFileError(error)) {
    return new NotFoundError(`${action} ${filePath}: file not found`, { cause: error });
  }
  return new IoError(`${action} ${filePath}: ${detail}`, { cause: error });
}
