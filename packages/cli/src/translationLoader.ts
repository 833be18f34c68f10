import fs from "node:fs/promises";
import path from "node:path";
import type { TranslationEntry } from "@transtally/shared";
import { normalizePath } from "./core/projectClassifier.js";
import { flattenObject, isPlainObject } from "./translationTree.js";

const DEFAULT_LOAD_CONCURRENCY = 16;

export type TranslationLoadErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "READ_FAILED"
  | "INVALID_JSON"
  | "NOT_AN_OBJECT"
  | "DUPLICATE_KEY";

export class TranslationLoadError extends Error {
  readonly code: TranslationLoadErrorCode;
  readonly filePath: string;

  constructor(code: TranslationLoadErrorCode, filePath: string, message: string) {
    super(message);
    this.code = code;
    this.filePath = filePath;
    this.name = "TranslationLoadError";
  }
}

export type LoadFailure = {
  filePath: string;
  error: TranslationLoadError;
};

export type LoadedTranslations = {
  entries: TranslationEntry[];
  failures: LoadFailure[];
};

export type LoadTranslationsOptions = {
  rootDir: string;
  concurrency?: number;
  failFast?: boolean;
};

export const parsePositiveInteger = (value: string | undefined, fallback: number) => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
};

export const loadConcurrency = () =>
  parsePositiveInteger(
    process.env.TRANSTALLY_LOAD_CONCURRENCY,
    DEFAULT_LOAD_CONCURRENCY,
  );

export const relativeFilePath = (rootDir: string, filePath: string) =>
  normalizePath(path.relative(rootDir, path.resolve(rootDir, filePath)));

export async function readTranslationFile(
  filePath: string,
  rootDir: string,
): Promise<TranslationEntry[]> {
  const displayPath = relativeFilePath(rootDir, filePath);

  if (path.extname(filePath).toLowerCase() !== ".json") {
    throw new TranslationLoadError(
      "UNSUPPORTED_FORMAT",
      displayPath,
      `File is not a JSON file: ${displayPath}`,
    );
  }

  let raw: string;
  try {
    raw = await fs.readFile(path.resolve(rootDir, filePath), "utf8");
  } catch (error) {
    throw new TranslationLoadError(
      "READ_FAILED",
      displayPath,
      `Cannot read file: ${displayPath} (${(error as Error).message})`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new TranslationLoadError(
      "INVALID_JSON",
      displayPath,
      `Invalid JSON format in ${displayPath} (${(error as Error).message})`,
    );
  }

  if (!isPlainObject(parsed)) {
    throw new TranslationLoadError(
      "NOT_AN_OBJECT",
      displayPath,
      `Root element is not a JSON object: ${displayPath}`,
    );
  }

  const entries: TranslationEntry[] = [];
  const seenKeys = new Set<string>();

  for (const leaf of flattenObject(parsed)) {
    if (seenKeys.has(leaf.key)) {
      throw new TranslationLoadError(
        "DUPLICATE_KEY",
        displayPath,
        `Duplicate translation key "${leaf.key}" in ${displayPath}`,
      );
    }
    seenKeys.add(leaf.key);

    entries.push(
      leaf.literal
        ? { key: leaf.key, value: leaf.value, filePath: displayPath, literal: true }
        : { key: leaf.key, value: leaf.value, filePath: displayPath },
    );
  }

  return entries;
}

const runWithConcurrency = async <T>(
  items: readonly T[],
  limit: number,
  run: (item: T, index: number) => Promise<void>,
) => {
  let cursor = 0;
  let stopped = false;

  const worker = async () => {
    while (!stopped && cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        await run(items[index], index);
      } catch (error) {
        stopped = true;
        throw error;
      }
    }
  };

  const count = Math.min(Math.max(1, limit), items.length);
  await Promise.all(Array.from({ length: count }, () => worker()));
};

/**
 * Loads every file with a bounded pool of workers. Each worker fills its own
 * slot; slots are merged in file order once all workers have finished.
 */
export async function loadTranslationFiles(
  files: readonly string[],
  options: LoadTranslationsOptions,
): Promise<LoadedTranslations> {
  const slots: Array<TranslationEntry[] | LoadFailure> = new Array(files.length);

  await runWithConcurrency(
    files,
    options.concurrency ?? loadConcurrency(),
    async (filePath, index) => {
      try {
        slots[index] = await readTranslationFile(filePath, options.rootDir);
      } catch (error) {
        if (options.failFast || !(error instanceof TranslationLoadError)) {
          throw error;
        }
        slots[index] = { filePath: error.filePath, error };
      }
    },
  );

  const entries: TranslationEntry[] = [];
  const failures: LoadFailure[] = [];
  for (const slot of slots) {
    if (Array.isArray(slot)) {
      for (const entry of slot) {
        entries.push(entry);
      }
    } else {
      failures.push(slot);
    }
  }

  return { entries, failures };
}
