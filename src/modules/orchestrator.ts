/**
 * Batch Orchestrator
 * Converts work items one at a time through the plugin
 */

import { describeError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import {
  ExitCode,
  type BatchHooks,
  type BatchResult,
  type ConverterPlugin,
  type WorkItem,
} from "../types";

export interface BatchOptions {
  // Inputs already skipped before conversion
  failures: number;
  logger: Logger;
  hooks?: BatchHooks;
}

/**
 * Run the batch in order. A failed conversion stops the batch; skipped
 * inputs only turn a success into a partial failure.
 */
export async function runBatch(
  items: readonly WorkItem[],
  plugin: ConverterPlugin,
  options: BatchOptions,
): Promise<BatchResult> {
  const { failures, logger, hooks } = options;
  let converted = 0;

  for (const item of items) {
    logger.debug(`Converting "${item.inputPath}" into "${item.outputDirectory}"`);

    let succeeded: boolean;
    let failure: unknown;
    try {
      succeeded = await plugin.convert(item.inputPath, item.outputDirectory);
    } catch (error) {
      succeeded = false;
      failure = error;
    }

    if (!succeeded) {
      const reason = failure === undefined ? "" : ` ${describeError(failure)}`;
      logger.fatal(`Error during conversion of "${item.inputPath}".${reason}`);
      hooks?.onFailed?.(item, failure);
      return { exitCode: ExitCode.Fatal, converted, failures, aborted: true };
    }

    converted++;
    hooks?.onConverted?.(item);
  }

  return {
    exitCode: failures > 0 ? ExitCode.PartialFailure : ExitCode.Success,
    converted,
    failures,
    aborted: false,
  };
}
