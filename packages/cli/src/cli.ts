import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { detailedReportForProject, globalReportAll, globalReportForProject } from "./commands.js";
import { ConfigError, loadConfig } from "./config.js";
import { FileSearchError } from "./fileSearch.js";
import {
  type ReportFormat,
  printAllProjects,
  printDetailedReport,
  printProjectSummary,
} from "./report.js";
import { type LoadFailure, TranslationLoadError } from "./translationLoader.js";

type ReportOptions = {
  help: boolean;
  version: boolean;
  rootPath?: string;
  configPath?: string;
  format: ReportFormat;
  strict: boolean;
};

type GlobalReportCommand = ReportOptions & {
  command: "global-report";
  packagePath?: string;
};

type DetailedReportCommand = ReportOptions & {
  command: "detailed-report";
  packagePath: string;
};

type GeneralCommand = {
  command: "general";
  help: boolean;
  version: boolean;
};

export type CliOptions = GlobalReportCommand | DetailedReportCommand | GeneralCommand;

const projectRoot = () => process.env.INIT_CWD || process.cwd();

const getVersion = async () => {
  let directory = path.dirname(fileURLToPath(import.meta.url));

  while (true) {
    try {
      const raw = await fs.readFile(path.join(directory, "package.json"), "utf8");
      const pkg = JSON.parse(raw) as { version?: unknown };
      return typeof pkg.version === "string" ? pkg.version : "0.0.0";
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        throw error;
      }
    }

    const parent = path.dirname(directory);
    if (parent === directory) {
      return "0.0.0";
    }
    directory = parent;
  }
};

export const printHelp = () => {
  console.log(`transtally

Find translated strings that are duplicated across the projects of a monorepo.

Usage:
  transtally global-report [--package-path <path>] [options]
  transtally detailed-report --package-path <path> [options]

Options:
  -h, --help                 Show help
  -v, --version              Show version

Report options:
  --package-path <path>      Project to analyse, e.g. packages/manager/apps/zimbra
                             (global-report analyses every project when omitted)
  --root-path <dir>          Monorepo root (default: current directory)
  --config <file>            Config file (default: transtally.config.{json,js,mjs,cjs} in the root)
  --format <human|json|both> Output format (default: human)
  --json                     Shortcut for --format json
  --strict                   Abort on the first translation file that fails to load
`);
};

const readValue = (args: string[], index: number, flag: string) => {
  const nextValue = args[index + 1];
  if (!nextValue || nextValue.startsWith("-")) {
    throw new Error(`Missing value for ${flag}.`);
  }
  return nextValue;
};

export const parseArgs = (args: string[]): CliOptions => {
  const firstArg = args[0];

  if (firstArg !== "global-report" && firstArg !== "detailed-report") {
    const options: GeneralCommand = { command: "general", help: false, version: false };

    for (const arg of args) {
      if (arg === "-h" || arg === "--help") {
        options.help = true;
        continue;
      }
      if (arg === "-v" || arg === "--version") {
        options.version = true;
        continue;
      }
      if (!arg.startsWith("-")) {
        throw new Error(`Unknown command: ${arg}`);
      }
      throw new Error(`Unknown argument: ${arg}`);
    }

    if (!options.help && !options.version) {
      throw new Error("Missing command. Use global-report or detailed-report.");
    }

    return options;
  }

  const commandArgs = args.slice(1);
  const options: ReportOptions & { packagePath?: string } = {
    help: false,
    version: false,
    format: "human",
    strict: false,
  };

  for (let index = 0; index < commandArgs.length; index += 1) {
    const arg = commandArgs[index];

    if (arg === "-h" || arg === "--help") {
      options.help = true;
      continue;
    }
    if (arg === "-v" || arg === "--version") {
      options.version = true;
      continue;
    }
    if (arg === "--json") {
      options.format = "json";
      continue;
    }
    if (arg === "--strict") {
      options.strict = true;
      continue;
    }
    if (arg === "--format") {
      const nextValue = readValue(commandArgs, index, "--format");
      if (nextValue !== "human" && nextValue !== "json" && nextValue !== "both") {
        throw new Error("Invalid value for --format. Use human, json, or both.");
      }
      options.format = nextValue;
      index += 1;
      continue;
    }
    if (arg === "--package-path") {
      options.packagePath = readValue(commandArgs, index, "--package-path");
      index += 1;
      continue;
    }
    if (arg === "--root-path") {
      options.rootPath = readValue(commandArgs, index, "--root-path");
      index += 1;
      continue;
    }
    if (arg === "--config") {
      options.configPath = readValue(commandArgs, index, "--config");
      index += 1;
      continue;
    }

    throw new Error(`Unknown argument for transtally ${firstArg}: ${arg}`);
  }

  if (firstArg === "global-report") {
    return { command: firstArg, ...options };
  }

  if (!options.packagePath && !options.help && !options.version) {
    throw new Error(
      "Missing --package-path. Usage: transtally detailed-report --package-path <path>",
    );
  }

  return { command: firstArg, ...options, packagePath: options.packagePath ?? "" };
};

const printConfigError = (error: ConfigError) => {
  if (error.code === "MISSING_CONFIG") {
    console.error("transtally could not start: config file was not found.");
    console.error(error.message);
    return;
  }

  console.error("transtally could not start: invalid configuration.");
  console.error(error.message);
};

const printLoadWarnings = (failures: readonly LoadFailure[]) => {
  for (const failure of failures) {
    console.error(`Warning: skipped ${failure.filePath}: ${failure.error.message}`);
  }
};

async function run(args: string[]) {
  const options = parseArgs(args);

  if (options.help) {
    printHelp();
    return;
  }

  if (options.version) {
    console.log(await getVersion());
    return;
  }

  if (options.command === "general") {
    printHelp();
    return;
  }

  const rootDir = path.resolve(projectRoot(), options.rootPath ?? ".");
  // --config is relative to where the command runs; discovery looks in the root.
  const config = await loadConfig({
    cwd: rootDir,
    configPath: options.configPath && path.resolve(projectRoot(), options.configPath),
  });
  const corpusOptions = { rootDir, config, strict: options.strict };

  if (options.command === "detailed-report") {
    const result = await detailedReportForProject(corpusOptions, options.packagePath);
    printLoadWarnings(result.failures);
    printDetailedReport(result, options.format);
    return;
  }

  if (options.packagePath) {
    const result = await globalReportForProject(corpusOptions, options.packagePath);
    printLoadWarnings(result.failures);
    printProjectSummary(result, options.format);
    return;
  }

  const result = await globalReportAll(corpusOptions);
  printLoadWarnings(result.failures);
  printAllProjects(result, options.format);
}

/** Runs the command line and resolves with the process exit code. */
export async function runCli(args: string[]): Promise<number> {
  try {
    await run(args);
    return 0;
  } catch (e) {
    if (e instanceof ConfigError) {
      printConfigError(e);
      return 1;
    }

    if (e instanceof FileSearchError || e instanceof TranslationLoadError) {
      console.error(e.message);
      return 1;
    }

    console.error(e instanceof Error ? e.message : String(e));
    printHelp();
    return 1;
  }
}
