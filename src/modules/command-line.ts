/**
 * Command-line parsing
 * Maps the option schema onto commander and reads the tokens back out
 */

import {
  Command,
  CommanderError,
  InvalidArgumentError,
  Option,
} from "commander";
import { ArgumentError } from "../utils/errors";
import type { OptionDeclaration, OptionValue } from "../types";
import type { OptionSchema } from "./schema";

export const USAGE =
  "[-short-option value --long-option value] [-i] file_a [file_b ...]";

export interface CommandLineResult {
  // Only values that were given on the command line
  values: Map<string, OptionValue>;
  // Tokens no declaration matched, in command-line order
  unrecognized: string[];
}

function flagsFor(declaration: OptionDeclaration): string {
  const long = `--${declaration.name}`;
  const names = declaration.short ? `-${declaration.short}, ${long}` : long;

  switch (declaration.type) {
    case "flag":
      return names;
    case "strings":
      return `${names} <${declaration.valueName ?? "values"}...>`;
    default:
      return `${names} <${declaration.valueName ?? "value"}>`;
  }
}

function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

function toOptionValue(
  raw: unknown,
  declaration: OptionDeclaration,
): OptionValue | undefined {
  switch (declaration.type) {
    case "flag":
      return raw === true;
    case "integer":
      return typeof raw === "number" ? raw : undefined;
    case "string":
      return typeof raw === "string" ? raw : undefined;
    case "strings":
      return Array.isArray(raw)
        ? raw.filter((entry): entry is string => typeof entry === "string")
        : undefined;
  }
}

export class CommandLineParser {
  constructor(
    private readonly programName: string,
    private readonly schema: OptionSchema,
  ) {}

  /**
   * Parse tokens against every declaration
   *
   * Unknown flags are collected instead of rejected and bare tokens are
   * appended to `input-files`. Throws ArgumentError for a missing or
   * malformed option value.
   */
  parse(argv: readonly string[]): CommandLineResult {
    const { command, options } = this.createCommand();
    const unrecognized: string[] = [];
    const operands: string[] = [];

    // commander stops at the first unknown flag, so resume after it
    let remaining = [...argv];
    try {
      while (remaining.length > 0) {
        const result = command.parseOptions(remaining);
        operands.push(...result.operands);

        const [unknown, ...rest] = result.unknown;
        if (unknown === undefined) break;
        unrecognized.push(unknown);
        remaining = rest;
      }
    } catch (error) {
      if (error instanceof CommanderError) {
        throw new ArgumentError(error.message.replace(/^error: /, ""), {
          cause: error,
        });
      }
      throw error;
    }

    const values = new Map<string, OptionValue>();
    for (const [declaration, option] of options) {
      const key = option.attributeName();
      if (command.getOptionValueSource(key) !== "cli") continue;

      const raw: unknown = command.getOptionValue(key);
      const value = toOptionValue(raw, declaration);
      if (value !== undefined) values.set(declaration.name, value);
    }

    if (operands.length > 0) {
      const explicit = values.get("input-files");
      const files = Array.isArray(explicit) ? explicit : [];
      values.set("input-files", [...files, ...operands]);
    }

    return { values, unrecognized };
  }

  /**
   * Rendered option list for the command-line scope
   */
  helpInformation(): string {
    return this.createCommand().command.helpInformation();
  }

  // A fresh command per parse keeps runs independent of each other
  private createCommand(): {
    command: Command;
    options: Map<OptionDeclaration, Option>;
  } {
    const command = new Command(this.programName)
      .usage(USAGE)
      .helpOption(false)
      .allowUnknownOption()
      .allowExcessArguments()
      .exitOverride()
      .configureOutput({
        writeOut: () => undefined,
        writeErr: () => undefined,
        outputError: () => undefined,
      });

    const options = new Map<OptionDeclaration, Option>();
    for (const declaration of [
      ...this.schema.commandLine,
      ...this.schema.configFile,
    ]) {
      const option = new Option(flagsFor(declaration), declaration.description);
      if (declaration.type === "integer") option.argParser(parseInteger);
      if (declaration.defaultValue !== undefined) {
        option.default(declaration.defaultValue);
      }
      if (declaration.scope === "config-file") option.hideHelp();

      command.addOption(option);
      options.set(declaration, option);
    }

    return { command, options };
  }
}
