/**
 * Converter executable
 * Shared main() for every converter program: resolve options, build the
 * work items and run the batch
 */

import ora from "ora";
import path from "node:path";
import * as modules from "../modules";
import { describeError } from "../utils/errors";
import { Logger, type LogSink } from "../utils/logger";
import {
  ExitCode,
  governingAction,
  type BatchHooks,
  type ConverterPlugin,
} from "../types";
import type { TextOutput } from "../modules/progress";
import {
  displayHelp,
  displayUnrecognizedOptions,
  displayVersion,
} from "./messages";

export interface ExecutableIO {
  cwd?: string;
  stdout?: TextOutput;
  console?: LogSink;
}

function interactiveHooks(): BatchHooks {
  return {
    onConverted: (item) => {
      ora().succeed(`Converted ${path.basename(item.inputPath)}`);
    },
    onFailed: (item) => {
      ora().fail(`Failed to convert ${path.basename(item.inputPath)}`);
    },
  };
}

/**
 * Run a converter program. Never throws; resolves to the process exit code.
 */
export async function runConverter(
  plugin: ConverterPlugin,
  argv: readonly string[],
  io: ExecutableIO = {},
): Promise<number> {
  const cwd = io.cwd ?? process.cwd();
  const stdout = io.stdout ?? process.stdout;
  const sink = io.console ?? console;

  // Verbosity is unknown until the options are resolved
  const bootstrap = new Logger("fatal", sink);

  let schema: modules.OptionSchema;
  let resolution: modules.Resolution;
  try {
    schema = modules.buildOptionSchema(plugin);
    resolution = await modules.resolveOptions(argv, plugin, schema, { cwd });
  } catch (error) {
    bootstrap.fatal(describeError(error));
    return ExitCode.Fatal;
  }

  const logger = new Logger(resolution.logLevel, sink);
  logger.flush(resolution.deferred);

  // Plugin calls below may throw as well; none of them escapes
  try {
    plugin.setLogger?.(logger);

    switch (governingAction(resolution.status)) {
      case "unrecognized-options":
        displayUnrecognizedOptions(resolution.unrecognized, plugin, schema, stdout);
        return ExitCode.UnrecognizedOptions;
      case "help":
        displayHelp(plugin, schema, stdout);
        return ExitCode.Success;
      case "version":
        displayVersion(plugin, stdout);
        return ExitCode.Success;
      case "no-inputs":
        return ExitCode.Success;
      case "convert":
        break;
    }

    const { common } = resolution;
    plugin.registerProgressCallback(
      modules.createProgressReporter(common, stdout),
    );

    const batch = await modules.prepareWorkItems(resolution.inputFiles, {
      cwd,
      outputDirectory: resolution.options.getString("output-directory"),
      logger,
    });

    const result = await modules.runBatch(batch.items, plugin, {
      failures: batch.failures.length,
      logger,
      hooks: common.nonInteractive ? undefined : interactiveHooks(),
    });

    if (!common.nonInteractive) {
      stdout.write(`${modules.formatSummary(result)}\n`);
    }

    return result.exitCode;
  } catch (error) {
    logger.fatal(describeError(error));
    return ExitCode.Fatal;
  }
}
