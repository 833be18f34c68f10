import type {
  DetailedReport,
  DetailedReportJson,
  DuplicationDetail,
  DuplicationJson,
  DuplicationSummary,
  GlobalReportAllJson,
  GlobalReportJson,
  ProjectSummary,
} from "@transtally/shared";

export const toGlobalReportJson = (
  summary: DuplicationSummary,
  filesFound: number,
): GlobalReportJson => ({
  files_found: filesFound,
  inter_package_duplication: summary.interPackage,
  common_translation_duplication: summary.commonTranslation,
  external_projects_duplication: summary.externalProjects,
  total_duplication: summary.total,
});

const toDuplicationJson = (detail: DuplicationDetail): DuplicationJson => ({
  translation_value: detail.value,
  duplication_types: [...detail.types],
  occurrences_count: detail.occurrencesCount,
  inter_package_duplication: detail.counts.interPackage,
  common_translation_duplication: detail.counts.commonTranslation,
  external_projects_duplication: detail.counts.externalProjects,
  locations: detail.locations.map((location) => ({
    file_path: location.filePath,
    translation_key: location.key,
    own_project: location.ownProject,
  })),
});

export const toDetailedReportJson = (
  report: DetailedReport,
  filesFound: number,
): DetailedReportJson => ({
  files_found: filesFound,
  package_path: report.projectPath,
  global_report: toGlobalReportJson(report.summary, filesFound),
  duplications: report.duplications.map(toDuplicationJson),
});

export const toGlobalReportAllJson = (
  projects: readonly ProjectSummary[],
  filesFound: number,
): GlobalReportAllJson => ({
  files_found: filesFound,
  projects: projects.map((project) => ({
    package_path: project.projectPath,
    package_type: project.packageType,
    ...toGlobalReportJson(project.summary, filesFound),
  })),
});
