/**
 * Output Path Resolver
 * Turns candidate inputs into work items and prepares output directories
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import { OutputDirectoryError } from "../utils/errors";
import { isDirectory, pathExists } from "../utils/fs";
import type { Logger } from "../utils/logger";
import type { PreparedBatch, WorkItem } from "../types";

export interface WorkItemOptions {
  cwd: string;
  // Overrides the input's own folder when set
  outputDirectory?: string;
  logger: Logger;
}

async function ensureDirectory(directory: string, logger: Logger): Promise<void> {
  if (await isDirectory(directory)) return;

  logger.info(`Output folder does not exist. Creating "${directory}"`);
  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw new OutputDirectoryError(directory, error);
  }
}

/**
 * Validate every input and pair it with its output directory
 *
 * Missing inputs are logged and returned as failures. The shared output
 * directory is created once, when the first existing input needs it; a
 * creation failure throws OutputDirectoryError.
 */
export async function prepareWorkItems(
  inputFiles: readonly string[],
  options: WorkItemOptions,
): Promise<PreparedBatch> {
  const { cwd, logger } = options;
  const items: WorkItem[] = [];
  const failures: string[] = [];
  const override =
    options.outputDirectory !== undefined
      ? path.resolve(cwd, options.outputDirectory)
      : undefined;
  let overrideReady = false;

  for (const inputFile of inputFiles) {
    const inputPath = path.isAbsolute(inputFile)
      ? inputFile
      : path.resolve(cwd, inputFile);

    if (!(await pathExists(inputPath))) {
      logger.error(`File does not exist: ${inputPath}`);
      failures.push(inputPath);
      continue;
    }

    let outputDirectory: string;
    if (override !== undefined) {
      if (!overrideReady) {
        await ensureDirectory(override, logger);
        overrideReady = true;
      }
      outputDirectory = override;
    } else {
      outputDirectory = path.dirname(inputPath);
    }

    items.push(Object.freeze({ inputPath, outputDirectory }));
  }

  return { items, failures };
}
