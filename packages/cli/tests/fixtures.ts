import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ProjectTranslationEntry, TranslationEntry } from "@transtally/shared";
import { attachProjects } from "../src/core/translationEntries.js";

export const entry = (filePath: string, key: string, value: string): TranslationEntry => ({
  filePath,
  key,
  value,
});

export const classified = (entries: TranslationEntry[]): ProjectTranslationEntry[] =>
  attachProjects(entries);

// A small storefront monorepo reused by the analyzer, assembler and printer tests.
export const shopCorpus = (): TranslationEntry[] => [
  entry("apps/shop/Messages.json", "title", "Welcome"),
  entry("apps/shop/Messages.json", "cancel", "Cancel"),
  entry("apps/shop/Messages.json", "ok", "OK"),
  entry("apps/shop/admin/Messages.json", "cancel", "Cancel"),
  entry("apps/blog/Messages.json", "greeting", "Welcome"),
  entry("apps/blog/Messages.json", "cancel", "Cancel"),
  entry("modules/common/Messages.json", "cancel", "Cancel"),
  entry("modules/common/Messages.json", "ok", "OK"),
];

export const SHOP_COMMON_PATHS = ["modules/common"];

export const createTempDir = () => fs.mkdtemp(path.join(os.tmpdir(), "transtally-"));

export const removeTempDir = (directory: string) =>
  fs.rm(directory, { recursive: true, force: true });

export const writeTree = async (root: string, files: Record<string, string>) => {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf8");
  }
};

export const toPosixRelative = (root: string, filePath: string) =>
  path.relative(root, filePath).split(path.sep).join("/");
