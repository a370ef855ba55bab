import type { EntryStats, FileSystem } from "./types.js";

export type EntryKind = "none" | "file" | "directory" | "symlink" | "other";

/**
 * Check if an error means "nothing at this path" (ENOENT, or ENOTDIR when a
 * path component is a file).
 */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * lstat a path, returning null if it does not exist.
 */
export async function lstatIfExists(
  fs: FileSystem,
  target: string
): Promise<EntryStats | null> {
  try {
    return await fs.lstat(target);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * stat a path, following symlinks; null if it or the link target is missing.
 */
export async function statIfExists(
  fs: FileSystem,
  target: string
): Promise<EntryStats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export function kindOf(stats: EntryStats | null): EntryKind {
  if (stats === null) {
    return "none";
  }
  if (stats.isSymbolicLink()) {
    return "symlink";
  }
  if (stats.isFile()) {
    return "file";
  }
  if (stats.isDirectory()) {
    return "directory";
  }
  return "other";
}

/**
 * Classify a path without following symlinks.
 */
export async function entryKind(
  fs: FileSystem,
  target: string
): Promise<EntryKind> {
  return kindOf(await lstatIfExists(fs, target));
}

export async function readFileIfExists(
  fs: FileSystem,
  target: string
): Promise<Uint8Array | null> {
  try {
    return await fs.readFile(target);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export function formatMode(mode: number): string {
  return mode.toString(8).padStart(3, "0");
}
