import fs from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { ProjectMarkers, TranstallyConfig } from "@transtally/shared";

export type ConfigErrorCode = "MISSING_CONFIG" | "INVALID_CONFIG";

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "ConfigError";
  }
}

export const CONFIG_FILE_NAMES = [
  "transtally.config.json",
  "transtally.config.js",
  "transtally.config.mjs",
  "transtally.config.cjs",
];

export const DEFAULT_CONFIG: TranstallyConfig = {
  translationFilePattern: "^Messages_fr_FR\\.json$",
  skipDirectories: [
    ".git",
    "node_modules",
    "target",
    ".idea",
    ".vscode",
    "dist",
    "build",
    "manager-tools",
  ],
  commonTranslationPaths: ["packages/manager/modules/common-translations"],
  projectMarkers: {
    app: ["apps"],
    module: ["modules"],
  },
};

export type LoadConfigOptions = {
  cwd: string;
  configPath?: string;
};

const cloneDefaults = (): TranstallyConfig => ({
  translationFilePattern: DEFAULT_CONFIG.translationFilePattern,
  skipDirectories: [...DEFAULT_CONFIG.skipDirectories],
  commonTranslationPaths: [...DEFAULT_CONFIG.commonTranslationPaths],
  projectMarkers: {
    app: [...DEFAULT_CONFIG.projectMarkers.app],
    module: [...DEFAULT_CONFIG.projectMarkers.module],
  },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readStringList = (value: unknown, field: string): string[] => {
  if (!Array.isArray(value)) {
    throw new ConfigError(
      "INVALID_CONFIG",
      `\`${field}\` must be an array of strings when provided.`,
    );
  }

  return value.map((entry) => {
    if (typeof entry !== "string" || !entry.trim()) {
      throw new ConfigError(
        "INVALID_CONFIG",
        `\`${field}\` must only contain non-empty strings.`,
      );
    }
    return entry.trim();
  });
};

export const compileTranslationFilePattern = (pattern: string) => {
  if (!pattern.trim()) {
    throw new ConfigError(
      "INVALID_CONFIG",
      "`translationFilePattern` must be a non-empty regular expression.",
    );
  }

  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(
      "INVALID_CONFIG",
      `\`translationFilePattern\` is not a valid regular expression: ${(error as Error).message}`,
    );
  }
};

const normalizeMarkers = (value: unknown): ProjectMarkers => {
  if (!isRecord(value)) {
    throw new ConfigError(
      "INVALID_CONFIG",
      "`projectMarkers` must be an object with `app` and `module` lists.",
    );
  }

  const markers: ProjectMarkers = {
    app:
      value.app === undefined
        ? [...DEFAULT_CONFIG.projectMarkers.app]
        : readStringList(value.app, "projectMarkers.app"),
    module:
      value.module === undefined
        ? [...DEFAULT_CONFIG.projectMarkers.module]
        : readStringList(value.module, "projectMarkers.module"),
  };

  const all = [...markers.app, ...markers.module];
  if (all.length === 0) {
    throw new ConfigError(
      "INVALID_CONFIG",
      "`projectMarkers` must declare at least one marker directory.",
    );
  }
  if (all.some((marker) => marker.includes("/") || marker.includes("\\"))) {
    throw new ConfigError(
      "INVALID_CONFIG",
      "`projectMarkers` entries must be single directory names.",
    );
  }

  return markers;
};

export const normalizeConfig = (value: unknown): TranstallyConfig => {
  if (!isRecord(value)) {
    throw new ConfigError("INVALID_CONFIG", "Config must be an object.");
  }

  const cfg = cloneDefaults();

  if (value.translationFilePattern !== undefined) {
    if (typeof value.translationFilePattern !== "string") {
      throw new ConfigError(
        "INVALID_CONFIG",
        "`translationFilePattern` must be a string when provided.",
      );
    }
    cfg.translationFilePattern = value.translationFilePattern;
  }
  compileTranslationFilePattern(cfg.translationFilePattern);

  if (value.skipDirectories !== undefined) {
    cfg.skipDirectories = readStringList(value.skipDirectories, "skipDirectories");
  }

  if (value.commonTranslationPaths !== undefined) {
    cfg.commonTranslationPaths = readStringList(
      value.commonTranslationPaths,
      "commonTranslationPaths",
    );
    if (cfg.commonTranslationPaths.length === 0) {
      throw new ConfigError(
        "INVALID_CONFIG",
        "`commonTranslationPaths` must list at least one project path.",
      );
    }
  }

  if (value.projectMarkers !== undefined) {
    cfg.projectMarkers = normalizeMarkers(value.projectMarkers);
  }

  return cfg;
};

const fileExists = async (filePath: string) => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const resolveConfigPath = async (cwd: string) => {
  for (const fileName of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, fileName);
    if (await fileExists(candidatePath)) {
      return candidatePath;
    }
  }

  return null;
};

const unwrapDefaultExport = (value: unknown): unknown => {
  if (isRecord(value) && "default" in value) {
    return value.default;
  }

  return value;
};

const readConfigFile = async (configPath: string): Promise<unknown> => {
  const extension = path.extname(configPath).toLowerCase();

  if (extension === ".json") {
    return JSON.parse(await fs.readFile(configPath, "utf8"));
  }
  if (extension === ".cjs") {
    return unwrapDefaultExport(createRequire(import.meta.url)(configPath));
  }

  return unwrapDefaultExport(await import(pathToFileURL(configPath).href));
};

export async function loadConfig(options: LoadConfigOptions): Promise<TranstallyConfig> {
  let configPath: string | null;

  if (options.configPath) {
    configPath = path.resolve(options.cwd, options.configPath);
    if (!(await fileExists(configPath))) {
      throw new ConfigError("MISSING_CONFIG", `Config file not found: ${configPath}`);
    }
  } else {
    configPath = await resolveConfigPath(options.cwd);
  }

  if (!configPath) {
    return cloneDefaults();
  }

  try {
    return normalizeConfig(await readConfigFile(configPath));
  } catch (e) {
    if (e instanceof ConfigError) {
      throw e;
    }

    throw new ConfigError(
      "INVALID_CONFIG",
      `Invalid ${path.basename(configPath)}: ${(e as Error).message}`,
    );
  }
}
