import type { ProjectTranslationEntry, TranslationEntry } from "@transtally/shared";
import { compareEntries, compareText } from "./translationEntries.js";

type EntryContent = Pick<TranslationEntry, "value" | "literal">;

/**
 * Every loaded entry grouped by its exact JSON value. Keys are JSON-encoded,
 * so the text `"1"` and the number `1` land in different groups.
 */
export type ContentIndex = ReadonlyMap<string, readonly ProjectTranslationEntry[]>;

const NO_DUPLICATES: readonly ProjectTranslationEntry[] = Object.freeze([]);

export const contentKeyOf = (content: EntryContent) =>
  content.literal ? content.value : JSON.stringify(content.value);

export const buildContentIndex = (
  entries: readonly ProjectTranslationEntry[],
): ContentIndex => {
  const groups = new Map<string, ProjectTranslationEntry[]>();

  for (const entry of entries) {
    const contentKey = contentKeyOf(entry);
    const group = groups.get(contentKey);
    if (group) {
      group.push(entry);
    } else {
      groups.set(contentKey, [entry]);
    }
  }

  return new Map(
    Array.from(groups.entries())
      .sort(([left], [right]) => compareText(left, right))
      .map(([contentKey, group]): [string, readonly ProjectTranslationEntry[]] => [
        contentKey,
        Object.freeze(group.sort(compareEntries)),
      ]),
  );
};

/** Looks up the group of an entry, or of a plain text when given a string. */
export const duplicatesOf = (index: ContentIndex, content: string | EntryContent) =>
  index.get(contentKeyOf(typeof content === "string" ? { value: content } : content)) ??
  NO_DUPLICATES;
