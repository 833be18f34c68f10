import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export type FileSearchErrorCode = "UNREADABLE_PATH";

export class FileSearchError extends Error {
  readonly code: FileSearchErrorCode;
  readonly searchPath: string;

  constructor(code: FileSearchErrorCode, searchPath: string, message: string) {
    super(message);
    this.code = code;
    this.searchPath = searchPath;
    this.name = "FileSearchError";
  }
}

const unreadable = (directory: string, error: unknown) =>
  new FileSearchError(
    "UNREADABLE_PATH",
    directory,
    `Unable to read path: ${directory} (${(error as Error).message})`,
  );

const readDirectory = async (directory: string) => {
  try {
    return {
      realPath: await fs.realpath(directory),
      entries: await fs.readdir(directory, { withFileTypes: true }),
    };
  } catch (error) {
    throw unreadable(directory, error);
  }
};

type EntryKind = "directory" | "file" | "other";

// Symbolic links are followed; a dangling link is ignored.
const kindOf = async (entry: Dirent, fullPath: string): Promise<EntryKind> => {
  if (entry.isDirectory()) {
    return "directory";
  }
  if (entry.isFile()) {
    return "file";
  }
  if (!entry.isSymbolicLink()) {
    return "other";
  }

  try {
    const stats = await fs.stat(fullPath);
    return stats.isDirectory() ? "directory" : stats.isFile() ? "file" : "other";
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return "other";
    }
    throw unreadable(fullPath, error);
  }
};

/**
 * Lists files under `rootDir` whose name matches `pattern`. Directories named
 * in `skipDirectories` are never entered, whatever their depth. Each real
 * directory is walked once, so symlink cycles end.
 */
export async function searchTranslationFiles(
  rootDir: string,
  pattern: RegExp,
  skipDirectories: readonly string[],
): Promise<string[]> {
  const skipped = new Set(skipDirectories);
  const visited = new Set<string>();
  const matches: string[] = [];

  const visit = async (directory: string): Promise<void> => {
    const { realPath, entries } = await readDirectory(directory);
    if (visited.has(realPath)) {
      return;
    }
    visited.add(realPath);

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      const kind = await kindOf(entry, fullPath);

      if (kind === "directory") {
        if (skipped.has(entry.name)) {
          continue;
        }

        await visit(fullPath);
        continue;
      }

      if (kind === "file" && pattern.test(entry.name)) {
        matches.push(fullPath);
      }
    }
  };

  await visit(rootDir);
  return matches.sort();
}
