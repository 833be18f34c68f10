import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileSearchError, searchTranslationFiles } from "../src/fileSearch.js";
import { createTempDir, removeTempDir, toPosixRelative, writeTree } from "./fixtures.js";

let root: string;

beforeEach(async () => {
  root = await createTempDir();
  await writeTree(root, {
    "packages/manager/apps/zimbra/Messages_fr_FR.json": "{}",
    "packages/manager/apps/zimbra/Messages_en_GB.json": "{}",
    "packages/manager/apps/zimbra/node_modules/dep/Messages_fr_FR.json": "{}",
    "packages/manager/apps/zimbra/dist/Messages_fr_FR.json": "{}",
    "packages/manager/modules/common-translations/translations/Messages_fr_FR.json": "{}",
    "node_modules/pkg/Messages_fr_FR.json": "{}",
  });
});

afterEach(async () => {
  await removeTempDir(root);
});

describe("searchTranslationFiles", () => {
  it("matches file names and prunes skipped directories at any depth", async () => {
    const files = await searchTranslationFiles(root, /^Messages_fr_FR\.json$/, [
      "node_modules",
      "dist",
    ]);

    expect(files.map((file) => toPosixRelative(root, file))).toEqual([
      "packages/manager/apps/zimbra/Messages_fr_FR.json",
      "packages/manager/modules/common-translations/translations/Messages_fr_FR.json",
    ]);
  });

  it("descends into every directory when nothing is skipped", async () => {
    const files = await searchTranslationFiles(root, /^Messages_fr_FR\.json$/, []);

    expect(files).toHaveLength(5);
  });

  it("tests the pattern against the file name only", async () => {
    const files = await searchTranslationFiles(root, /^zimbra/, []);

    expect(files).toEqual([]);
  });

  it("follows symbolic links and walks each real directory once", async () => {
    const outside = await createTempDir();
    try {
      await writeTree(outside, {
        "shared/Messages_fr_FR.json": "{}",
        "single/Messages_fr_FR.json": "{}",
      });
      await fs.symlink(path.join(outside, "shared"), path.join(root, "external"));
      await fs.mkdir(path.join(root, "linked"));
      await fs.symlink(
        path.join(outside, "single/Messages_fr_FR.json"),
        path.join(root, "linked/Messages_fr_FR.json"),
      );
      await fs.symlink(root, path.join(root, "packages/loop"));
      await fs.symlink(path.join(root, "nowhere"), path.join(root, "dangling"));

      const files = await searchTranslationFiles(root, /^Messages_fr_FR\.json$/, [
        "node_modules",
        "dist",
      ]);

      expect(files.map((file) => toPosixRelative(root, file))).toEqual([
        "external/Messages_fr_FR.json",
        "linked/Messages_fr_FR.json",
        "packages/manager/apps/zimbra/Messages_fr_FR.json",
        "packages/manager/modules/common-translations/translations/Messages_fr_FR.json",
      ]);
    } finally {
      await removeTempDir(outside);
    }
  });

  it("fails when the root cannot be read", async () => {
    const missing = path.join(root, "missing");

    await expect(searchTranslationFiles(missing, /json$/, [])).rejects.toBeInstanceOf(
      FileSearchError,
    );
    await expect(searchTranslationFiles(missing, /json$/, [])).rejects.toMatchObject({
      code: "UNREADABLE_PATH",
      searchPath: missing,
    });
  });
});
