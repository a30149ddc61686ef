/**
 * Help, version and unrecognized-option output
 */

import chalk from "chalk";
import { CommandLineParser, USAGE } from "../modules/command-line";
import type { OptionSchema } from "../modules/schema";
import type { TextOutput } from "../modules/progress";
import type { ConverterPlugin } from "../types";
import { CORE_VERSION } from "../utils/version";

export function helpText(plugin: ConverterPlugin, schema: OptionSchema): string {
  const options = new CommandLineParser(plugin.programName, schema)
    .helpInformation()
    .replace(/^Usage:.*\n\n?/, "");

  return [
    "Usage:",
    `${plugin.programName} ${USAGE}:`,
    "",
    'Short options start with a single "-", while long options start with "--".',
    'A value enclosed in "[]" signifies it is optional.',
    "Some options only exists in the long form, while others exist in both forms.",
    "Not all options require arguments (arg).",
    "",
    options,
  ].join("\n");
}

export function displayHelp(
  plugin: ConverterPlugin,
  schema: OptionSchema,
  output: TextOutput,
): void {
  output.write(helpText(plugin, schema));
}

export function displayUnrecognizedOptions(
  unrecognized: readonly string[],
  plugin: ConverterPlugin,
  schema: OptionSchema,
  output: TextOutput,
): void {
  const header =
    unrecognized.length === 1 ? "Unrecognized option:" : "Unrecognized options:";

  output.write(`${chalk.red(header)}\n`);
  for (const option of unrecognized) {
    output.write(`${option}\n`);
  }
  output.write("\n");
  displayHelp(plugin, schema, output);
}

export function displayVersion(plugin: ConverterPlugin, output: TextOutput): void {
  output.write(`Version of ${plugin.programName}: ${plugin.getVersion()}\n`);
  output.write(`Version of converter base: ${CORE_VERSION}\n`);

  const libraries = plugin.getLibraryVersions?.() ?? {};
  for (const [library, version] of Object.entries(libraries)) {
    output.write(`Version of ${library}: ${version}\n`);
  }
}
