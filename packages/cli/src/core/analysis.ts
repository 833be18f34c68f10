import type {
  DetailedReport,
  DuplicationSummary,
  ProjectMarkers,
  ProjectSummary,
  ProjectTranslationEntry,
  TranslationEntry,
} from "@transtally/shared";
import { type ContentIndex, buildContentIndex } from "./contentIndex.js";
import {
  type DuplicationRecord,
  analyzeProjectDuplication,
} from "./duplicationAnalyzer.js";
import { DEFAULT_PROJECT_MARKERS } from "./projectClassifier.js";
import {
  assembleDetailedReport,
  summarizeDuplication,
} from "./reportAssembler.js";
import {
  attachProjects,
  getTranslationsForProject,
  groupTranslationsByProject,
} from "./translationEntries.js";

export type DuplicationAnalysisOptions = {
  commonTranslationPaths: readonly string[];
  projectMarkers?: ProjectMarkers;
};

export type DuplicationAnalysis = {
  entries: readonly ProjectTranslationEntry[];
  contentIndex: ContentIndex;
  projects: () => string[];
  analyzeProject: (targetProject: string) => DuplicationRecord[];
  summaryForProject: (targetProject: string) => DuplicationSummary;
  detailedReportForProject: (targetProject: string) => DetailedReport;
  summariesForAllProjects: () => ProjectSummary[];
};

/**
 * Indexes a fully loaded corpus once; every per-project analysis afterwards
 * reads the same content index.
 */
export const createDuplicationAnalysis = (
  loaded: readonly TranslationEntry[],
  options: DuplicationAnalysisOptions,
): DuplicationAnalysis => {
  const entries = Object.freeze(
    attachProjects(loaded, options.projectMarkers ?? DEFAULT_PROJECT_MARKERS),
  );
  const contentIndex = buildContentIndex(entries);
  const byProject = groupTranslationsByProject(entries);
  const commonTranslationPaths = [...options.commonTranslationPaths];

  const analyzeProject = (targetProject: string) =>
    analyzeProjectDuplication({
      targetProject,
      projectEntries: getTranslationsForProject(targetProject, entries),
      contentIndex,
      commonTranslationPaths,
    });

  return {
    entries,
    contentIndex,
    projects: () => Array.from(byProject.keys()),
    analyzeProject,
    summaryForProject: (targetProject) =>
      summarizeDuplication(analyzeProject(targetProject)),
    detailedReportForProject: (targetProject) =>
      assembleDetailedReport(targetProject, analyzeProject(targetProject)),
    summariesForAllProjects: () =>
      Array.from(byProject.values()).map((group) => ({
        projectPath: group.projectPath,
        packageType: group.packageType,
        summary: summarizeDuplication(
          analyzeProjectDuplication({
            targetProject: group.projectPath,
            projectEntries: group.entries,
            contentIndex,
            commonTranslationPaths,
          }),
        ),
      })),
  };
};
