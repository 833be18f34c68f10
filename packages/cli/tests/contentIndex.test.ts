import { describe, expect, it } from "vitest";
import { buildContentIndex, duplicatesOf } from "../src/core/contentIndex.js";
import { classified, entry } from "./fixtures.js";

const locations = (group: readonly { filePath: string; key: string }[]) =>
  group.map((member) => `${member.filePath}#${member.key}`);

describe("buildContentIndex", () => {
  it("groups entries by identical text, not by key", () => {
    const index = buildContentIndex(
      classified([
        entry("apps/a/Messages.json", "save", "Save"),
        entry("apps/b/Messages.json", "submit", "Save"),
        entry("apps/b/Messages.json", "title", "Title"),
        entry("apps/c/Messages.json", "title", "Heading"),
      ]),
    );

    expect(locations(duplicatesOf(index, "Save"))).toEqual([
      "apps/a/Messages.json#save",
      "apps/b/Messages.json#submit",
    ]);
    expect(locations(duplicatesOf(index, "Title"))).toEqual(["apps/b/Messages.json#title"]);
    expect(locations(duplicatesOf(index, "Heading"))).toEqual(["apps/c/Messages.json#title"]);
  });

  it("treats empty and whitespace-only text as ordinary values", () => {
    const index = buildContentIndex(
      classified([
        entry("apps/a/Messages.json", "blank", ""),
        entry("apps/b/Messages.json", "blank", ""),
        entry("apps/b/Messages.json", "space", " "),
      ]),
    );

    expect(duplicatesOf(index, "")).toHaveLength(2);
    expect(duplicatesOf(index, " ")).toHaveLength(1);
  });

  it("orders values and group members independently of input order", () => {
    const entries = classified([
      entry("apps/z/Messages.json", "b", "Same"),
      entry("apps/a/Messages.json", "z", "Same"),
      entry("apps/z/Messages.json", "a", "Same"),
      entry("apps/a/Messages.json", "x", "Other"),
    ]);

    const forward = buildContentIndex(entries);
    const backward = buildContentIndex([...entries].reverse());

    expect(Array.from(forward.keys())).toEqual(['"Other"', '"Same"']);
    expect(locations(duplicatesOf(forward, "Same"))).toEqual([
      "apps/a/Messages.json#z",
      "apps/z/Messages.json#a",
      "apps/z/Messages.json#b",
    ]);
    expect(Array.from(backward.entries())).toEqual(Array.from(forward.entries()));
  });

  it("keeps non-string values apart from the same text", () => {
    const index = buildContentIndex(
      classified([
        { filePath: "apps/a/Messages.json", key: "count", value: "1", literal: true },
        entry("apps/b/Messages.json", "label", "1"),
        { filePath: "apps/c/Messages.json", key: "limit", value: "1", literal: true },
      ]),
    );

    expect(locations(duplicatesOf(index, "1"))).toEqual(["apps/b/Messages.json#label"]);
    expect(locations(duplicatesOf(index, { value: "1", literal: true }))).toEqual([
      "apps/a/Messages.json#count",
      "apps/c/Messages.json#limit",
    ]);
  });

  it("returns frozen groups and an empty group for unknown text", () => {
    const index = buildContentIndex(classified([entry("apps/a/Messages.json", "k", "v")]));

    expect(Object.isFrozen(duplicatesOf(index, "v"))).toBe(true);
    expect(duplicatesOf(index, "missing")).toEqual([]);
  });
});
