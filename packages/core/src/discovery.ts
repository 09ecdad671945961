import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { isMissingFileError, toFsError } from "./errors.js";

export interface ListedFile {
  path: string;
  sizeBytes: number;
  mtimeMs: number;
}

export interface ListingOptions {
  includeGlobs: string[];
  deep: number;
}

export interface DirectoryStamp {
  path: string;
  mtimeMs: number;
}

/** Stats a file, resolving to null when it has disappeared. */
export async function statListedFile(filePath: string): Promise<ListedFile | null> {
  try {
    const fileStat = await stat(filePath);
    if (!fileStat.isFile()) return null;
    return { path: filePath, sizeBytes: fileStat.size, mtimeMs: fileStat.mtimeMs };
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw toFsError(error, "stat", filePath);
  }
}

export async function statDirectory(dirPath: string): Promise<DirectoryStamp | null> {
  try {
    const dirStat = await stat(dirPath);
    if (!dirStat.isDirectory()) return null;
    return { path: dirPath, mtimeMs: dirStat.mtimeMs };
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw toFsError(error, "stat", dirPath);
  }
}

export async function listSessionFiles(root: string, options: ListingOptions): Promise<ListedFile[]> {
  const matches = await fg(options.includeGlobs, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
    deep: options.deep,
    suppressErrors: true,
    unique: true,
    followSymbolicLinks: false,
  });

  const files: ListedFile[] = [];
  for (const filePath of matches) {
    const listed = await statListedFile(path.resolve(filePath));
    if (listed) files.push(listed);
  }
  files.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
  return files;
}

/** The root and every directory beneath it, down to `deep` levels. */
export async function listDirectories(root: string, deep: number): Promise<DirectoryStamp[]> {
  const rootStamp = await statDirectory(root);
  if (!rootStamp) return [];
  const matches = await fg("**", {
    cwd: root,
    absolute: true,
    onlyDirectories: true,
    dot: true,
    deep,
    suppressErrors: true,
    unique: true,
    followSymbolicLinks: false,
  });

  const stamps: DirectoryStamp[] = [rootStamp];
  for (const dirPath of matches) {
    const stamp = await statDirectory(path.resolve(dirPath));
    if (stamp) stamps.push(stamp);
  }
  return stamps;
}
