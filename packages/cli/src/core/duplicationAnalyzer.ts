import type {
  DuplicationCounts,
  DuplicationType,
  ProjectTranslationEntry,
} from "@transtally/shared";
import { type ContentIndex, contentKeyOf, duplicatesOf } from "./contentIndex.js";
import {
  isCommonTranslations,
  normalizeProjectPath,
} from "./projectClassifier.js";
import {
  belongsToProject,
  compareEntries,
  compareText,
  isSameEntry,
} from "./translationEntries.js";

export type DuplicationContext = {
  targetProject: string;
  commonTranslationPaths: readonly string[];
};

/**
 * Duplication of one translated text as seen from a target project.
 *
 * `counts` are summed over every entry of the target project carrying the
 * text; the three categories are independent and may all be non-zero.
 */
export type DuplicationRecord = {
  value: string;
  literal: boolean;
  occurrencesCount: number;
  counts: DuplicationCounts;
  types: DuplicationType[];
  members: readonly ProjectTranslationEntry[];
};

export type AnalyzeProjectInput = DuplicationContext & {
  projectEntries: readonly ProjectTranslationEntry[];
  contentIndex: ContentIndex;
};

const DUPLICATION_TYPES: DuplicationType[] = [
  "InterPackage",
  "CommonTranslation",
  "ExternalProjects",
];

export const emptyCounts = (): DuplicationCounts => ({
  interPackage: 0,
  commonTranslation: 0,
  externalProjects: 0,
});

export const countFor = (counts: DuplicationCounts, type: DuplicationType) => {
  switch (type) {
    case "InterPackage":
      return counts.interPackage;
    case "CommonTranslation":
      return counts.commonTranslation;
    case "ExternalProjects":
      return counts.externalProjects;
  }
};

const addCount = (counts: DuplicationCounts, type: DuplicationType, amount = 1) => {
  switch (type) {
    case "InterPackage":
      counts.interPackage += amount;
      return;
    case "CommonTranslation":
      counts.commonTranslation += amount;
      return;
    case "ExternalProjects":
      counts.externalProjects += amount;
      return;
  }
};

export const totalOf = (counts: DuplicationCounts) =>
  counts.interPackage + counts.commonTranslation + counts.externalProjects;

// A member lands in exactly one category; entries without a project are external.
export const classifyMember = (
  member: ProjectTranslationEntry,
  context: DuplicationContext,
): DuplicationType => {
  if (member.project.kind === "classified") {
    if (belongsToProject(member, context.targetProject)) {
      return "InterPackage";
    }
    if (isCommonTranslations(member.project.projectPath, context.commonTranslationPaths)) {
      return "CommonTranslation";
    }
  }

  return "ExternalProjects";
};

export const countEntryDuplication = (
  entry: ProjectTranslationEntry,
  group: readonly ProjectTranslationEntry[],
  context: DuplicationContext,
): DuplicationCounts => {
  const counts = emptyCounts();

  for (const member of group) {
    if (isSameEntry(member, entry)) {
      continue;
    }
    addCount(counts, classifyMember(member, context));
  }

  return counts;
};

// Text sorts before an equally spelled literal.
export const compareRecordValues = (
  left: Pick<DuplicationRecord, "value" | "literal">,
  right: Pick<DuplicationRecord, "value" | "literal">,
) => compareText(left.value, right.value) || Number(left.literal) - Number(right.literal);

export const analyzeProjectDuplication = ({
  targetProject,
  projectEntries,
  contentIndex,
  commonTranslationPaths,
}: AnalyzeProjectInput): DuplicationRecord[] => {
  const context: DuplicationContext = {
    targetProject: normalizeProjectPath(targetProject),
    commonTranslationPaths,
  };
  const records = new Map<string, DuplicationRecord>();

  for (const entry of [...projectEntries].sort(compareEntries)) {
    const group = duplicatesOf(contentIndex, entry);
    if (group.length <= 1) {
      continue;
    }

    const entryCounts = countEntryDuplication(entry, group, context);
    if (totalOf(entryCounts) === 0) {
      continue;
    }

    const contentKey = contentKeyOf(entry);
    let record = records.get(contentKey);
    if (!record) {
      record = {
        value: entry.value,
        literal: entry.literal === true,
        occurrencesCount: group.length,
        counts: emptyCounts(),
        types: [],
        members: group,
      };
      records.set(contentKey, record);
    }

    for (const type of DUPLICATION_TYPES) {
      addCount(record.counts, type, countFor(entryCounts, type));
    }
  }

  return Array.from(records.values())
    .map((record) => ({
      ...record,
      types: DUPLICATION_TYPES.filter((type) => countFor(record.counts, type) > 0),
    }))
    .sort(compareRecordValues);
};
