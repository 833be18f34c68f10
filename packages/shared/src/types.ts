export type ProjectMarkers = {
  app: string[];
  module: string[];
};

export type TranstallyConfig = {
  translationFilePattern: string;
  skipDirectories: string[];
  commonTranslationPaths: string[];
  projectMarkers: ProjectMarkers;
};

export type PackageType = "app" | "module";

export type TranslationEntry = {
  key: string;
  value: string;
  filePath: string;
  /** Set for non-string JSON values; `value` then holds their JSON text. */
  literal?: boolean;
};

export type ProjectClassification =
  | {
      kind: "classified";
      projectPath: string;
      packageType: PackageType;
    }
  | {
      kind: "unclassifiable";
      reason: string;
    };

export type ProjectTranslationEntry = TranslationEntry & {
  project: ProjectClassification;
};

export type DuplicationType =
  | "InterPackage"
  | "CommonTranslation"
  | "ExternalProjects";

export type DuplicationCounts = {
  interPackage: number;
  commonTranslation: number;
  externalProjects: number;
};

export type DuplicationSummary = DuplicationCounts & {
  total: number;
};

export type DuplicationLocation = {
  filePath: string;
  key: string;
  ownProject: boolean;
};

export type DuplicationDetail = {
  value: string;
  /** `value` is the JSON text of a non-string value. */
  literal: boolean;
  types: DuplicationType[];
  occurrencesCount: number;
  counts: DuplicationCounts;
  locations: DuplicationLocation[];
};

export type DetailedReport = {
  projectPath: string;
  summary: DuplicationSummary;
  duplications: DuplicationDetail[];
};

export type ProjectSummary = {
  projectPath: string;
  packageType: PackageType;
  summary: DuplicationSummary;
};

// Interchange shapes. Field names are part of the contract with external callers.

export type GlobalReportJson = {
  files_found: number;
  inter_package_duplication: number;
  common_translation_duplication: number;
  external_projects_duplication: number;
  total_duplication: number;
};

export type DuplicationLocationJson = {
  file_path: string;
  translation_key: string;
  own_project: boolean;
};

export type DuplicationJson = {
  translation_value: string;
  duplication_types: DuplicationType[];
  occurrences_count: number;
  inter_package_duplication: number;
  common_translation_duplication: number;
  external_projects_duplication: number;
  locations: DuplicationLocationJson[];
};

export type DetailedReportJson = {
  files_found: number;
  package_path: string;
  global_report: GlobalReportJson;
  duplications: DuplicationJson[];
};

export type ProjectReportJson = GlobalReportJson & {
  package_path: string;
  package_type: PackageType;
};

export type GlobalReportAllJson = {
  files_found: number;
  projects: ProjectReportJson[];
};
