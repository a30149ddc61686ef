/**
 * Option Schema Registry
 * Collects the common option declarations and the plugin's own
 */

import type {
  ConverterPlugin,
  OptionDeclaration,
  OptionScope,
  OptionSource,
  OptionValue,
} from "../types";

interface DeclarationInput {
  short?: string;
  description: string;
  valueName?: string;
}

export class OptionSchemaBuilder {
  private readonly declarations: OptionDeclaration[] = [];

  constructor(
    readonly source: OptionSource,
    readonly scope: OptionScope,
  ) {}

  flag(name: string, input: DeclarationInput): this {
    return this.add(name, "flag", input, false);
  }

  integer(name: string, input: DeclarationInput & { defaultValue?: number }): this {
    return this.add(name, "integer", input, input.defaultValue);
  }

  string(name: string, input: DeclarationInput & { defaultValue?: string }): this {
    return this.add(name, "string", input, input.defaultValue);
  }

  strings(name: string, input: DeclarationInput & { defaultValue?: string[] }): this {
    return this.add(name, "strings", input, input.defaultValue);
  }

  build(): OptionDeclaration[] {
    return [...this.declarations];
  }

  private add(
    name: string,
    type: OptionDeclaration["type"],
    input: DeclarationInput,
    defaultValue: OptionValue | undefined,
  ): this {
    if (this.declarations.some((d) => d.name === name)) {
      throw new Error(`Option "${name}" is declared twice`);
    }

    this.declarations.push(
      Object.freeze({
        name,
        type,
        short: input.short,
        description: input.description,
        valueName: input.valueName,
        defaultValue,
        source: this.source,
        scope: this.scope,
      }),
    );
    return this;
  }
}

export interface OptionSchema {
  readonly commandLine: readonly OptionDeclaration[];
  readonly configFile: readonly OptionDeclaration[];
}

export function registerCommonOptions(schema: OptionSchemaBuilder): void {
  schema
    .flag("help", { short: "h", description: "Print this help message." })
    .flag("version", { short: "v", description: "Print version information." })
    .integer("verbose", {
      description: "Set verbosity of output (0-5).",
      valueName: "level",
      defaultValue: 1,
    })
    .string("input-directory", {
      short: "I",
      description: "Input directory to convert files from.",
      valueName: "path",
    })
    .string("output-directory", {
      short: "O",
      description: "Output directory to place converted files into.",
      valueName: "path",
    })
    .flag("non-interactive", {
      description: "Run in non-interactive mode, with no progress output.",
    })
    .string("timezone", {
      short: "t",
      description:
        "Display times in UTC (u), logger localtime (l, default) or PC local time (p).",
      valueName: "zone",
      defaultValue: "l",
    })
    .strings("input-files", {
      short: "i",
      description:
        "List of files to convert, ignored if input-directory is specified. All unknown arguments will be interpreted as input files.",
      valueName: "paths",
    });
}

/**
 * Assemble the full schema: common options first, then the plugin's
 */
export function buildOptionSchema(plugin: ConverterPlugin): OptionSchema {
  const common = new OptionSchemaBuilder("common", "command-line");
  registerCommonOptions(common);

  const pluginOptions = new OptionSchemaBuilder("plugin", "command-line");
  plugin.configureParser(pluginOptions);

  const fileOptions = new OptionSchemaBuilder("plugin", "config-file");
  plugin.configureFileParser(fileOptions);

  return Object.freeze({
    commandLine: Object.freeze([...common.build(), ...pluginOptions.build()]),
    configFile: Object.freeze(fileOptions.build()),
  });
}
