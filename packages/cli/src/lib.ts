export {
  type DuplicationAnalysis,
  type DuplicationAnalysisOptions,
  createDuplicationAnalysis,
} from "./core/analysis.js";
export {
  type ContentIndex,
  buildContentIndex,
  contentKeyOf,
  duplicatesOf,
} from "./core/contentIndex.js";
export {
  type AnalyzeProjectInput,
  type DuplicationContext,
  type DuplicationRecord,
  analyzeProjectDuplication,
  classifyMember,
  countEntryDuplication,
} from "./core/duplicationAnalyzer.js";
export {
  DEFAULT_PROJECT_MARKERS,
  classifyProjectPath,
  isCommonTranslations,
  projectPathOf,
} from "./core/projectClassifier.js";
export { assembleDetailedReport, summarizeDuplication } from "./core/reportAssembler.js";
export {
  toDetailedReportJson,
  toGlobalReportAllJson,
  toGlobalReportJson,
} from "./core/serialize.js";
export {
  attachProjects,
  getTranslationsForProject,
  groupTranslationsByProject,
} from "./core/translationEntries.js";
export {
  detailedReportForProject,
  globalReportAll,
  globalReportForProject,
  loadCorpus,
} from "./commands.js";
export { ConfigError, DEFAULT_CONFIG, loadConfig } from "./config.js";
export { FileSearchError, searchTranslationFiles } from "./fileSearch.js";
export {
  TranslationLoadError,
  loadTranslationFiles,
  readTranslationFile,
} from "./translationLoader.js";
