/**
 * Converter base
 * Default plumbing shared by converter plugins
 */

import type { OptionSchemaBuilder } from "./modules/schema";
import { Logger } from "./utils/logger";
import type { ResolvedOptions } from "./utils/resolved-options";
import type {
  CommonOptions,
  ConverterPlugin,
  ParseStatus,
  ProgressCallback,
} from "./types";

export abstract class ConverterBase implements ConverterPlugin {
  abstract readonly programName: string;
  readonly inputExtension: string = ".mf4";

  protected commonOptions: CommonOptions = {
    nonInteractive: false,
    timeDisplay: "logger-local",
  };

  protected logger = new Logger();

  private progressCallback: ProgressCallback = () => undefined;

  registerProgressCallback(callback: ProgressCallback): void {
    this.progressCallback = callback;
  }

  setLogger(logger: Logger): void {
    this.logger = logger;
  }

  configureParser(_schema: OptionSchemaBuilder): void {}

  configureFileParser(_schema: OptionSchemaBuilder): void {}

  usesConfigFile(): boolean {
    return false;
  }

  setCommonOptions(options: CommonOptions): void {
    this.commonOptions = options;
  }

  parseOptions(_options: ResolvedOptions): Partial<ParseStatus> {
    return {};
  }

  abstract convert(
    inputPath: string,
    outputDirectory: string,
  ): boolean | Promise<boolean>;

  abstract getVersion(): string;

  protected reportProgress(current: number, total: number): void {
    this.progressCallback(current, total);
  }
}
