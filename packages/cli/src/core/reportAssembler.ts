import type {
  DetailedReport,
  DuplicationDetail,
  DuplicationSummary,
} from "@transtally/shared";
import {
  type DuplicationRecord,
  compareRecordValues,
  totalOf,
} from "./duplicationAnalyzer.js";
import { normalizeProjectPath } from "./projectClassifier.js";
import { belongsToProject } from "./translationEntries.js";

export const summarizeDuplication = (
  records: readonly DuplicationRecord[],
): DuplicationSummary => {
  const summary: DuplicationSummary = {
    interPackage: 0,
    commonTranslation: 0,
    externalProjects: 0,
    total: 0,
  };

  for (const record of records) {
    summary.interPackage += record.counts.interPackage;
    summary.commonTranslation += record.counts.commonTranslation;
    summary.externalProjects += record.counts.externalProjects;
  }
  summary.total = totalOf(summary);

  return summary;
};

export const compareDuplicationRecords = (
  left: DuplicationRecord,
  right: DuplicationRecord,
) =>
  right.occurrencesCount - left.occurrencesCount || compareRecordValues(left, right);

const toDetail = (record: DuplicationRecord, projectPath: string): DuplicationDetail => ({
  value: record.value,
  literal: record.literal,
  types: [...record.types],
  occurrencesCount: record.occurrencesCount,
  counts: { ...record.counts },
  locations: record.members.map((member) => ({
    filePath: member.filePath,
    key: member.key,
    ownProject: belongsToProject(member, projectPath),
  })),
});

export const assembleDetailedReport = (
  targetProject: string,
  records: readonly DuplicationRecord[],
): DetailedReport => {
  const projectPath = normalizeProjectPath(targetProject);

  return {
    projectPath,
    summary: summarizeDuplication(records),
    duplications: [...records]
      .sort(compareDuplicationRecords)
      .map((record) => toDetail(record, projectPath)),
  };
};
