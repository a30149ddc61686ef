/**
 * Progress Reporter
 * Synchronous sink the plugin calls while it converts a file
 */

import type { CommonOptions, ProgressCallback } from "../types";

export const PROGRESS_WIDTH = 80;

export interface TextOutput {
  write(text: string): unknown;
}

/**
 * Render one progress line, starting with a carriage return so it
 * overwrites the previous one. Ends with a newline only when complete.
 */
export function renderProgressBar(
  current: number,
  total: number,
  width: number = PROGRESS_WIDTH,
): string {
  const complete = current === total;
  const fraction = total > 0 ? current / total : 1;
  const fill = Math.min(width, Math.max(0, Math.floor(fraction * width)));

  const filled = complete
    ? "=".repeat(fill)
    : "=".repeat(Math.max(0, fill - 1)) + ">";
  const bar = filled.padEnd(width, " ");

  return `\r${bar} ${current} / ${total}${complete ? "\n" : ""}`;
}

export function createProgressReporter(
  common: CommonOptions,
  output: TextOutput,
): ProgressCallback {
  return (current, total) => {
    if (common.nonInteractive) return;
    output.write(renderProgressBar(current, total));
  };
}
