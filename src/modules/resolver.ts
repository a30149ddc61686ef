/**
 * Option Resolver
 * Merges command line, configuration file and defaults into one option set
 * and derives the run's status, common settings and input files
 */

import { ResolvedOptions } from "../utils/resolved-options";
import { PluginError, describeError } from "../utils/errors";
import { pathExists } from "../utils/fs";
import {
  levelFromVerbosity,
  type DeferredLog,
  type LogLevel,
} from "../utils/logger";
import { parseTimeDisplay } from "../utils/time-format";
import {
  emptyStatus,
  mergeStatus,
  type CommonOptions,
  type ConverterPlugin,
  type OptionValue,
  type ParseStatus,
} from "../types";
import { CommandLineParser } from "./command-line";
import { configFilePath, loadConfigFile } from "./config-file";
import { scanInputDirectory } from "./discovery";
import type { OptionSchema } from "./schema";

export interface ResolveEnvironment {
  cwd: string;
}

export interface Resolution {
  options: ResolvedOptions;
  status: ParseStatus;
  common: CommonOptions;
  logLevel: LogLevel;
  inputFiles: string[];
  // Unknown tokens plus rejected values, ready to print
  unrecognized: string[];
  // Records to log once the verbosity is known
  deferred: DeferredLog[];
}

function defaultLayer(schema: OptionSchema): Map<string, OptionValue> {
  const defaults = new Map<string, OptionValue>();
  for (const declaration of [...schema.commandLine, ...schema.configFile]) {
    if (declaration.defaultValue !== undefined) {
      defaults.set(declaration.name, declaration.defaultValue);
    }
  }
  return defaults;
}

/**
 * Resolve argv into the final option set
 *
 * Throws ArgumentError, ConfigFileError or PluginError; all of them end
 * the run.
 */
export async function resolveOptions(
  argv: readonly string[],
  plugin: ConverterPlugin,
  schema: OptionSchema,
  env: ResolveEnvironment,
): Promise<Resolution> {
  const deferred: DeferredLog[] = [];
  let status = emptyStatus();

  // 1. Command line
  const parser = new CommandLineParser(plugin.programName, schema);
  const commandLine = parser.parse(argv);
  const unrecognized = [...commandLine.unrecognized];

  // 2. Configuration file, below anything given on the command line
  let configValues: Map<string, OptionValue> | undefined;
  if (plugin.usesConfigFile()) {
    const path = configFilePath(plugin.programName, env.cwd);

    if (await pathExists(path)) {
      const config = await loadConfigFile(path, schema.configFile);
      configValues = config.values;
      deferred.push({ level: "info", message: `Read configuration file "${path}".` });
      for (const key of config.ignored) {
        deferred.push({
          level: "debug",
          message: `Ignoring unknown configuration file key "${key}".`,
        });
      }
    } else {
      deferred.push({
        level: "info",
        message: "No configuration file found, skipping.",
      });
    }
  }

  const options = ResolvedOptions.merge({
    default: defaultLayer(schema),
    "config-file": configValues,
    "command-line": commandLine.values,
  });

  // 3. Help and version requests
  status = mergeStatus(status, {
    helpRequested: options.getFlag("help"),
    versionRequested: options.getFlag("version"),
  });

  // 4. Verbosity
  let logLevel: LogLevel = "error";
  const verbose = options.getInteger("verbose");
  const level = verbose === undefined ? null : levelFromVerbosity(verbose);
  if (level === null) {
    status = mergeStatus(status, { unrecognizedOptions: true });
    unrecognized.push(`--verbose ${verbose ?? ""}`.trimEnd());
  } else {
    logLevel = level;
  }

  // 5. Common settings handed to the plugin
  const common: CommonOptions = Object.freeze({
    nonInteractive: options.getFlag("non-interactive"),
    timeDisplay: parseTimeDisplay(options.getString("timezone")),
  });

  // 6. Input files
  const inputFiles: string[] = [];
  const inputDirectory = options.getString("input-directory");
  const explicitFiles = options.getStrings("input-files");

  if (inputDirectory !== undefined) {
    const scan = await scanInputDirectory(
      inputDirectory,
      plugin.inputExtension,
      env.cwd,
    );
    inputFiles.push(...scan.files);
    // An unusable directory leaves the batch empty, it is not a failure
    if (scan.error) {
      deferred.push({ level: "error", message: scan.error });
    }
  } else if (explicitFiles !== undefined) {
    inputFiles.push(...explicitFiles);
  } else {
    status = mergeStatus(status, { noInputFiles: true });
  }

  // 7. A bare invocation shows the help
  if (argv.length === 0) {
    status = mergeStatus(status, { helpRequested: true });
  }

  // 8. Plugin-specific settings
  plugin.setCommonOptions(common);
  try {
    status = mergeStatus(status, plugin.parseOptions(options));
  } catch (error) {
    throw new PluginError(
      `Error occurred during specialized input argument parsing: ${describeError(error)}`,
      { cause: error },
    );
  }

  // 9. Leftover tokens
  if (commandLine.unrecognized.length > 0) {
    status = mergeStatus(status, { unrecognizedOptions: true });
  }

  return {
    options,
    status,
    common,
    logLevel,
    inputFiles,
    unrecognized,
    deferred,
  };
}
