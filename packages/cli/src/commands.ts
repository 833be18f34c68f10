import path from "node:path";
import type {
  DetailedReport,
  DuplicationSummary,
  ProjectSummary,
  TranstallyConfig,
} from "@transtally/shared";
import { compileTranslationFilePattern } from "./config.js";
import {
  type DuplicationAnalysis,
  createDuplicationAnalysis,
} from "./core/analysis.js";
import { normalizeProjectPath } from "./core/projectClassifier.js";
import { searchTranslationFiles } from "./fileSearch.js";
import { type LoadFailure, loadTranslationFiles } from "./translationLoader.js";

export type CorpusOptions = {
  rootDir: string;
  config: TranstallyConfig;
  strict?: boolean;
  concurrency?: number;
};

export type Corpus = {
  rootDir: string;
  filesFound: number;
  failures: LoadFailure[];
  analysis: DuplicationAnalysis;
};

export type ProjectSummaryResult = {
  filesFound: number;
  failures: LoadFailure[];
  projectPath: string;
  summary: DuplicationSummary;
};

export type AllProjectsResult = {
  filesFound: number;
  failures: LoadFailure[];
  projects: ProjectSummary[];
};

export type DetailedReportResult = {
  filesFound: number;
  failures: LoadFailure[];
  report: DetailedReport;
};

export async function loadCorpus(options: CorpusOptions): Promise<Corpus> {
  const rootDir = path.resolve(options.rootDir);
  const pattern = compileTranslationFilePattern(options.config.translationFilePattern);
  const files = await searchTranslationFiles(
    rootDir,
    pattern,
    options.config.skipDirectories,
  );
  const loaded = await loadTranslationFiles(files, {
    rootDir,
    concurrency: options.concurrency,
    failFast: options.strict,
  });

  return {
    rootDir,
    filesFound: files.length,
    failures: loaded.failures,
    analysis: createDuplicationAnalysis(loaded.entries, {
      commonTranslationPaths: options.config.commonTranslationPaths,
      projectMarkers: options.config.projectMarkers,
    }),
  };
}

export async function globalReportForProject(
  options: CorpusOptions,
  packagePath: string,
): Promise<ProjectSummaryResult> {
  const corpus = await loadCorpus(options);
  const projectPath = normalizeProjectPath(packagePath);

  return {
    filesFound: corpus.filesFound,
    failures: corpus.failures,
    projectPath,
    summary: corpus.analysis.summaryForProject(projectPath),
  };
}

export async function globalReportAll(options: CorpusOptions): Promise<AllProjectsResult> {
  const corpus = await loadCorpus(options);

  return {
    filesFound: corpus.filesFound,
    failures: corpus.failures,
    projects: corpus.analysis.summariesForAllProjects(),
  };
}

export async function detailedReportForProject(
  options: CorpusOptions,
  packagePath: string,
): Promise<DetailedReportResult> {
  const corpus = await loadCorpus(options);

  return {
    filesFound: corpus.filesFound,
    failures: corpus.failures,
    report: corpus.analysis.detailedReportForProject(packagePath),
  };
}
