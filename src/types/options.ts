/**
 * Option type definitions
 * Declarations, resolved values and the settings shared with the plugin
 */

export type OptionType = "flag" | "integer" | "string" | "strings";
export type OptionValue = boolean | number | string | string[];

// Who declared the option
export type OptionSource = "common" | "plugin";

// Where the option may be given; config-file options are also accepted on
// the command line but are left out of the help text
export type OptionScope = "command-line" | "config-file";

// Where a resolved value came from, highest priority first
export type Provenance = "command-line" | "config-file" | "default";

export interface OptionDeclaration {
  name: string;
  short?: string;
  description: string;
  type: OptionType;
  defaultValue?: OptionValue;
  valueName?: string;
  source: OptionSource;
  scope: OptionScope;
}

export interface ResolvedOption {
  value: OptionValue;
  source: Provenance;
}

export type TimeDisplayFormat = "utc" | "pc-local" | "logger-local";

export interface CommonOptions {
  readonly nonInteractive: boolean;
  readonly timeDisplay: TimeDisplayFormat;
}
