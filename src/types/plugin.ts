/**
 * Converter plugin contract
 * The format-specific half of a converter program
 */

import type { OptionSchemaBuilder } from "../modules/schema";
import type { Logger } from "../utils/logger";
import type { ResolvedOptions } from "../utils/resolved-options";
import type { CommonOptions } from "./options";
import type { ParseStatus } from "./status";

export type ProgressCallback = (current: number, total: number) => void;

export interface ConverterPlugin {
  readonly programName: string;
  // Extension, with the leading dot, of files picked up from an input directory
  readonly inputExtension: string;

  registerProgressCallback(callback: ProgressCallback): void;
  // Called once the verbosity is known
  setLogger?(logger: Logger): void;
  configureParser(schema: OptionSchemaBuilder): void;
  configureFileParser(schema: OptionSchemaBuilder): void;
  usesConfigFile(): boolean;
  setCommonOptions(options: CommonOptions): void;
  parseOptions(options: ResolvedOptions): Partial<ParseStatus>;

  /**
   * Convert a single file. Resolving to `false` aborts the whole batch.
   */
  convert(inputPath: string, outputDirectory: string): boolean | Promise<boolean>;

  getVersion(): string;
  getLibraryVersions?(): Record<string, string>;
}
