import { realpathSync } from "node:fs";
import path from "node:path";
import { isMissingFileError, toFsError } from "./errors.js";
import { expandHome } from "./utils.js";

export function cleanPath(input: string): string {
  const resolved = path.resolve(expandHome(input.trim() || "."));
  const root = path.parse(resolved).root;
  return resolved.length > root.length ? resolved.replace(/[\\/]+$/, "") : resolved;
}

function withSeparator(input: string): string {
  return input.endsWith(path.sep) ? input : `${input}${path.sep}`;
}

/** Symlink-resolved form of a cleaned path; paths that do not exist resolve to themselves. */
export function resolveSymlinks(cleaned: string): string {
  try {
    return realpathSync.native(cleaned);
  } catch (error) {
    if (isMissingFileError(error)) return cleaned;
    throw toFsError(error, "resolve", cleaned);
  }
}

/**
 * A project path prepared for repeated cwd tests: the cleaned absolute form, the
 * symlink-resolved form, and both with a trailing separator for prefix checks.
 */
export class ResolvedProjectPath {
  readonly cleaned: string;
  readonly resolved: string;
  private readonly cleanedPrefix: string;
  private readonly resolvedPrefix: string;
  private readonly resolvedCwds = new Map<string, string>();

  constructor(projectPath: string) {
    this.cleaned = cleanPath(projectPath);
    this.resolved = resolveSymlinks(this.cleaned);
    this.cleanedPrefix = withSeparator(this.cleaned);
    this.resolvedPrefix = withSeparator(this.resolved);
  }

  /** True when `cwd` is the project directory or lies beneath it. */
  matchesCwd(cwd: string): boolean {
    if (!cwd.trim()) return false;
    const cleanedCwd = cleanPath(cwd);
    if (this.matchesCleaned(cleanedCwd)) return true;

    let resolvedCwd = this.resolvedCwds.get(cleanedCwd);
    if (resolvedCwd === undefined) {
      resolvedCwd = resolveSymlinks(cleanedCwd);
      this.resolvedCwds.set(cleanedCwd, resolvedCwd);
    }
    return resolvedCwd !== cleanedCwd && this.matchesCleaned(resolvedCwd);
  }

  private matchesCleaned(candidate: string): boolean {
    return (
      candidate === this.cleaned ||
      candidate === this.resolved ||
      candidate.startsWith(this.cleanedPrefix) ||
      candidate.startsWith(this.resolvedPrefix)
    );
  }
}
