import type {
  PackageType,
  ProjectClassification,
  ProjectMarkers,
} from "@transtally/shared";

export const DEFAULT_PROJECT_MARKERS: ProjectMarkers = {
  app: ["apps"],
  module: ["modules"],
};

export const normalizePath = (filePath: string) =>
  filePath.split("\\").join("/").replace(/^\.\//, "");

export const normalizeProjectPath = (projectPath: string) =>
  normalizePath(projectPath.trim()).replace(/\/+$/, "");

const packageTypeOf = (
  markers: ProjectMarkers,
  segment: string,
): PackageType | null => {
  if (markers.app.includes(segment)) {
    return "app";
  }
  if (markers.module.includes(segment)) {
    return "module";
  }
  return null;
};

/**
 * Derives the owning project of a translation file from its path alone.
 *
 * The project is the path up through the segment that follows the first
 * marker directory (`apps/<name>`, `modules/<name>`). A marker only counts
 * when something still sits below the project directory, so
 * `apps/catalog.json` is not a project.
 */
export const classifyProjectPath = (
  filePath: string,
  markers: ProjectMarkers = DEFAULT_PROJECT_MARKERS,
): ProjectClassification => {
  const segments = normalizePath(filePath).split("/");

  for (let index = 0; index < segments.length - 2; index += 1) {
    const packageType = packageTypeOf(markers, segments[index]);
    if (!packageType || segments[index + 1].length === 0) {
      continue;
    }

    return {
      kind: "classified",
      projectPath: segments.slice(0, index + 2).join("/"),
      packageType,
    };
  }

  const markerList = [...markers.app, ...markers.module].join(", ");
  return {
    kind: "unclassifiable",
    reason: `No project marker (${markerList}) found in ${filePath}`,
  };
};

export const projectPathOf = (
  filePath: string,
  markers: ProjectMarkers = DEFAULT_PROJECT_MARKERS,
): string | null => {
  const classification = classifyProjectPath(filePath, markers);
  return classification.kind === "classified" ? classification.projectPath : null;
};

export const isCommonTranslations = (
  projectPath: string,
  commonPaths: Iterable<string>,
) => {
  const normalized = normalizeProjectPath(projectPath);

  for (const commonPath of commonPaths) {
    const common = normalizeProjectPath(commonPath);
    if (common.length === 0) {
      continue;
    }
    if (normalized === common || normalized.startsWith(`${common}/`)) {
      return true;
    }
  }

  return false;
};
