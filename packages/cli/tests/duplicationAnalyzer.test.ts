import type { TranslationEntry } from "@transtally/shared";
import { describe, expect, it } from "vitest";
import { buildContentIndex, duplicatesOf } from "../src/core/contentIndex.js";
import {
  analyzeProjectDuplication,
  classifyMember,
  countEntryDuplication,
  totalOf,
} from "../src/core/duplicationAnalyzer.js";
import { summarizeDuplication } from "../src/core/reportAssembler.js";
import { getTranslationsForProject } from "../src/core/translationEntries.js";
import { classified, entry } from "./fixtures.js";

const analyze = (
  loaded: TranslationEntry[],
  targetProject: string,
  commonTranslationPaths: string[] = [],
) => {
  const entries = classified(loaded);
  return analyzeProjectDuplication({
    targetProject,
    projectEntries: getTranslationsForProject(targetProject, entries),
    contentIndex: buildContentIndex(entries),
    commonTranslationPaths,
  });
};

const summarize = (
  loaded: TranslationEntry[],
  targetProject: string,
  commonTranslationPaths: string[] = [],
) => summarizeDuplication(analyze(loaded, targetProject, commonTranslationPaths));

describe("analyzeProjectDuplication", () => {
  it("counts each entry of a project repeated inside that project", () => {
    const records = analyze(
      [
        entry("apps/p1/Messages.json", "a", "Hello"),
        entry("apps/p1/Other.json", "b", "Hello"),
      ],
      "apps/p1",
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      value: "Hello",
      occurrencesCount: 2,
      counts: { interPackage: 2, commonTranslation: 0, externalProjects: 0 },
      types: ["InterPackage"],
    });
    expect(summarizeDuplication(records)).toEqual({
      interPackage: 2,
      commonTranslation: 0,
      externalProjects: 0,
      total: 2,
    });
  });

  it("reports text already provided by the common module", () => {
    expect(
      summarize(
        [
          entry("modules/common/Messages.json", "hi", "Hi"),
          entry("apps/p1/Messages.json", "hi", "Hi"),
        ],
        "apps/p1",
        ["modules/common"],
      ),
    ).toEqual({ interPackage: 0, commonTranslation: 1, externalProjects: 0, total: 1 });
  });

  it("counts every unrelated project repeating the text", () => {
    expect(
      summarize(
        [
          entry("apps/p1/Messages.json", "hi", "Hi"),
          entry("apps/p2/Messages.json", "hi", "Hi"),
          entry("apps/p3/Messages.json", "hi", "Hi"),
        ],
        "apps/p1",
      ),
    ).toEqual({ interPackage: 0, commonTranslation: 0, externalProjects: 2, total: 2 });
  });

  it("returns an empty result for a project without entries", () => {
    const loaded = [
      entry("apps/p1/Messages.json", "hi", "Hi"),
      entry("apps/p2/Messages.json", "hi", "Hi"),
    ];

    expect(analyze(loaded, "apps/empty")).toEqual([]);
    expect(summarize(loaded, "apps/empty")).toEqual({
      interPackage: 0,
      commonTranslation: 0,
      externalProjects: 0,
      total: 0,
    });
    expect(summarize([], "apps/empty").total).toBe(0);
  });

  it("detects duplicated empty strings", () => {
    expect(
      summarize(
        [
          entry("apps/p1/Messages.json", "a", ""),
          entry("apps/p2/Messages.json", "b", ""),
        ],
        "apps/p1",
      ),
    ).toEqual({ interPackage: 0, commonTranslation: 0, externalProjects: 1, total: 1 });
  });

  it("produces no record for text that appears once", () => {
    expect(
      analyze(
        [
          entry("apps/p1/Messages.json", "a", "Only once"),
          entry("apps/p2/Messages.json", "b", "Something else"),
        ],
        "apps/p1",
      ),
    ).toEqual([]);
  });

  it("counts a second key of the same file but never the entry itself", () => {
    const records = analyze(
      [
        entry("apps/p1/Messages.json", "a", "Same"),
        entry("apps/p1/Messages.json", "b", "Same"),
      ],
      "apps/p1",
    );

    expect(records[0].counts.interPackage).toBe(2);
    expect(records[0].members.map((member) => member.key)).toEqual(["a", "b"]);
  });

  it("keeps overlapping categories for one text", () => {
    const records = analyze(
      [
        entry("apps/p1/Messages.json", "save", "Save"),
        entry("apps/p1/Other.json", "save.again", "Save"),
        entry("modules/common/Messages.json", "save", "Save"),
        entry("apps/p2/Messages.json", "save", "Save"),
        entry("apps/p3/Messages.json", "save", "Save"),
      ],
      "apps/p1",
      ["modules/common"],
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      occurrencesCount: 5,
      counts: { interPackage: 2, commonTranslation: 2, externalProjects: 4 },
      types: ["InterPackage", "CommonTranslation", "ExternalProjects"],
    });
  });

  it("counts entries outside any project as external", () => {
    expect(
      summarize(
        [
          entry("tools/Messages.json", "x", "Hi"),
          entry("apps/p1/Messages.json", "y", "Hi"),
        ],
        "apps/p1",
        ["tools"],
      ),
    ).toEqual({ interPackage: 0, commonTranslation: 0, externalProjects: 1, total: 1 });
  });

  it("classifies members of the common module as internal when it is the target", () => {
    expect(
      summarize(
        [
          entry("modules/common/a.json", "x", "X"),
          entry("modules/common/b.json", "x", "X"),
          entry("apps/p1/Messages.json", "x", "X"),
        ],
        "modules/common",
        ["modules/common"],
      ),
    ).toEqual({ interPackage: 2, commonTranslation: 0, externalProjects: 2, total: 4 });
  });

  it("gives the same result regardless of load order and across runs", () => {
    const loaded = [
      entry("apps/p1/Messages.json", "a", "Hello"),
      entry("apps/p2/Messages.json", "b", "Hello"),
      entry("apps/p1/Other.json", "c", "Bye"),
      entry("modules/common/Messages.json", "d", "Bye"),
      entry("apps/p1/Other.json", "e", "Hello"),
    ];

    const first = analyze(loaded, "apps/p1", ["modules/common"]);
    const again = analyze(loaded, "apps/p1", ["modules/common"]);
    const shuffled = analyze(
      [loaded[3], loaded[0], loaded[4], loaded[2], loaded[1]],
      "apps/p1",
      ["modules/common"],
    );

    expect(JSON.stringify(again)).toBe(JSON.stringify(first));
    expect(JSON.stringify(shuffled)).toBe(JSON.stringify(first));
    expect(first.map((record) => record.value)).toEqual(["Bye", "Hello"]);
  });
});

describe("countEntryDuplication", () => {
  it("never exceeds the other members of the group", () => {
    const entries = classified([
      entry("apps/p1/Messages.json", "a", "Text"),
      entry("apps/p1/Messages.json", "b", "Text"),
      entry("apps/p2/Messages.json", "a", "Text"),
      entry("modules/common/Messages.json", "a", "Text"),
    ]);
    const group = duplicatesOf(buildContentIndex(entries), "Text");
    const context = { targetProject: "apps/p1", commonTranslationPaths: ["modules/common"] };

    for (const own of entries.slice(0, 2)) {
      const counts = countEntryDuplication(own, group, context);
      expect(counts).toEqual({ interPackage: 1, commonTranslation: 1, externalProjects: 1 });
      expect(totalOf(counts)).toBe(group.length - 1);
    }
  });
});

describe("classifyMember", () => {
  it("prefers the target project over the common module", () => {
    const [member] = classified([entry("modules/common/a.json", "k", "v")]);

    expect(
      classifyMember(member, {
        targetProject: "modules/common",
        commonTranslationPaths: ["modules/common"],
      }),
    ).toBe("InterPackage");
    expect(
      classifyMember(member, {
        targetProject: "apps/p1",
        commonTranslationPaths: ["modules/common"],
      }),
    ).toBe("CommonTranslation");
    expect(
      classifyMember(member, { targetProject: "apps/p1", commonTranslationPaths: [] }),
    ).toBe("ExternalProjects");
  });
});
