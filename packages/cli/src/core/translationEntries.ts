import type {
  PackageType,
  ProjectMarkers,
  ProjectTranslationEntry,
  TranslationEntry,
} from "@transtally/shared";
import {
  DEFAULT_PROJECT_MARKERS,
  classifyProjectPath,
  normalizeProjectPath,
} from "./projectClassifier.js";

export type ProjectGroup = {
  projectPath: string;
  packageType: PackageType;
  entries: ProjectTranslationEntry[];
};

// Code-unit order, so output does not depend on the host locale.
export const compareText = (left: string, right: string) => {
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
};

export const compareEntries = (
  left: TranslationEntry,
  right: TranslationEntry,
) => compareText(left.filePath, right.filePath) || compareText(left.key, right.key);

export const isSameEntry = (left: TranslationEntry, right: TranslationEntry) =>
  left.filePath === right.filePath && left.key === right.key;

export const attachProjects = (
  entries: readonly TranslationEntry[],
  markers: ProjectMarkers = DEFAULT_PROJECT_MARKERS,
): ProjectTranslationEntry[] =>
  entries.map((entry) => ({
    ...entry,
    project: classifyProjectPath(entry.filePath, markers),
  }));

export const belongsToProject = (
  entry: ProjectTranslationEntry,
  projectPath: string,
) =>
  entry.project.kind === "classified" && entry.project.projectPath === projectPath;

export const getTranslationsForProject = (
  targetProject: string,
  entries: readonly ProjectTranslationEntry[],
): ProjectTranslationEntry[] => {
  const target = normalizeProjectPath(targetProject);
  return entries
    .filter((entry) => belongsToProject(entry, target))
    .sort(compareEntries);
};

export const groupTranslationsByProject = (
  entries: readonly ProjectTranslationEntry[],
): Map<string, ProjectGroup> => {
  const groups = new Map<string, ProjectGroup>();

  for (const entry of entries) {
    if (entry.project.kind !== "classified") {
      continue;
    }

    const { projectPath, packageType } = entry.project;
    const group = groups.get(projectPath);
    if (group) {
      group.entries.push(entry);
    } else {
      groups.set(projectPath, { projectPath, packageType, entries: [entry] });
    }
  }

  return new Map(
    Array.from(groups.entries())
      .sort(([left], [right]) => compareText(left, right))
      .map(([projectPath, group]): [string, ProjectGroup] => [
        projectPath,
        { ...group, entries: group.entries.sort(compareEntries) },
      ]),
  );
};
