/**
 * Library entry point for building converter programs
 */

export { runConverter } from "./cli/executable";
export type { ExecutableIO } from "./cli/executable";
export { displayHelp, displayVersion, helpText } from "./cli/messages";
export { ConverterBase } from "./converter";
export * from "./modules";
export * from "./types";
export { Logger, LOG_LEVELS, levelFromVerbosity } from "./utils/logger";
export type { LogLevel, LogSink, DeferredLog } from "./utils/logger";
export { ResolvedOptions } from "./utils/resolved-options";
export {
  ConverterError,
  ArgumentError,
  ConfigFileError,
  OutputDirectoryError,
  PluginError,
  describeError,
} from "./utils/errors";
export { parseTimeDisplay, formatTimestamp } from "./utils/time-format";
export { CORE_VERSION } from "./utils/version";
