/**
 * Summary Module
 * One-line batch outcome shown after an interactive run
 */

import chalk from "chalk";
import { ExitCode, type BatchResult } from "../types";

export function formatSummary(result: BatchResult): string {
  const statusIcon = result.aborted
    ? chalk.red("✖")
    : result.failures > 0
      ? chalk.yellow("◆")
      : chalk.green("✔");

  const parts = [chalk.green(`${result.converted} converted`)];
  if (result.failures > 0) {
    parts.push(chalk.yellow(`${result.failures} skipped`));
  }
  if (result.aborted) {
    parts.push(chalk.red("aborted"));
  }

  const title =
    result.exitCode === ExitCode.Success
      ? "Conversion Complete"
      : "Conversion Finished With Errors";

  return `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${parts.join(chalk.dim(" · "))}`;
}
