/**
 * Pipeline modules export
 */

export {
  OptionSchemaBuilder,
  registerCommonOptions,
  buildOptionSchema,
} from "./schema";
export type { OptionSchema } from "./schema";
export { CommandLineParser } from "./command-line";
export { loadConfigFile, parseConfigText, configFilePath } from "./config-file";
export { resolveOptions } from "./resolver";
export type { Resolution } from "./resolver";
export { scanInputDirectory } from "./discovery";
export { prepareWorkItems } from "./work-items";
export { runBatch } from "./orchestrator";
export {
  createProgressReporter,
  renderProgressBar,
  PROGRESS_WIDTH,
} from "./progress";
export type { TextOutput } from "./progress";
export { formatSummary } from "./summary";
