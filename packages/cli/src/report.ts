import type { DuplicationSummary } from "@transtally/shared";
import type {
  AllProjectsResult,
  DetailedReportResult,
  ProjectSummaryResult,
} from "./commands.js";
import {
  toDetailedReportJson,
  toGlobalReportAllJson,
  toGlobalReportJson,
} from "./core/serialize.js";

export type ReportFormat = "human" | "json" | "both";

const OWN_PROJECT_MARKER = "**";

export const formatTable = (rows: Array<{ label: string; value: number }>) => {
  const labelWidth = Math.max(...rows.map((row) => row.label.length));
  return rows.map((row) => `${row.label.padEnd(labelWidth)} : ${row.value}`);
};

export const formatSummary = (summary: DuplicationSummary) =>
  formatTable([
    { label: "Inter-package duplication", value: summary.interPackage },
    { label: "Common-translation duplication", value: summary.commonTranslation },
    { label: "External-projects duplication", value: summary.externalProjects },
    { label: "Total duplication", value: summary.total },
  ]);

export const formatProjectSummary = (result: ProjectSummaryResult) =>
  [
    `Found ${result.filesFound} files`,
    `Project: ${result.projectPath}`,
    "",
    ...formatSummary(result.summary),
  ].join("\n");

export const formatAllProjects = (result: AllProjectsResult) => {
  const lines = [
    `Found ${result.filesFound} files`,
    `Projects analysed: ${result.projects.length}`,
  ];

  for (const project of result.projects) {
    lines.push("", `${project.projectPath} (${project.packageType})`);
    lines.push(...formatSummary(project.summary));
  }

  return lines.join("\n");
};

export const formatDetailedReport = (result: DetailedReportResult) => {
  const { report } = result;
  const lines = [
    `Found ${result.filesFound} files`,
    `Project: ${report.projectPath}`,
    "",
    ...formatSummary(report.summary),
  ];

  for (const duplication of report.duplications) {
    lines.push(
      "",
      `Duplication seen ${duplication.occurrencesCount} times (${duplication.types.join(", ")})`,
      duplication.literal ? duplication.value : JSON.stringify(duplication.value),
    );
    for (const location of duplication.locations) {
      const marker = location.ownProject ? OWN_PROJECT_MARKER : "  ";
      lines.push(`${marker} ${location.filePath} - ${location.key}`);
    }
  }

  return lines.join("\n");
};

const printFormatted = (format: ReportFormat, human: () => string, json: () => unknown) => {
  if (format === "human" || format === "both") {
    console.log(human());
  }

  if (format === "json" || format === "both") {
    if (format === "both") {
      console.log("\nJSON output:");
    }
    console.log(JSON.stringify(json(), null, 2));
  }
};

export const printProjectSummary = (result: ProjectSummaryResult, format: ReportFormat) =>
  printFormatted(
    format,
    () => formatProjectSummary(result),
    () => ({
      package_path: result.projectPath,
      ...toGlobalReportJson(result.summary, result.filesFound),
    }),
  );

export const printAllProjects = (result: AllProjectsResult, format: ReportFormat) =>
  printFormatted(
    format,
    () => formatAllProjects(result),
    () => toGlobalReportAllJson(result.projects, result.filesFound),
  );

export const printDetailedReport = (result: DetailedReportResult, format: ReportFormat) =>
  printFormatted(
    format,
    () => formatDetailedReport(result),
    () => toDetailedReportJson(result.report, result.filesFound),
  );
