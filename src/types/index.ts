/**
 * Central type exports
 */

// Options
export type {
  OptionType,
  OptionValue,
  OptionSource,
  OptionScope,
  OptionDeclaration,
  Provenance,
  ResolvedOption,
  TimeDisplayFormat,
  CommonOptions,
} from "./options";

// Status
export type { ParseStatus, StatusAction } from "./status";
export { emptyStatus, mergeStatus, governingAction } from "./status";

// Batch
export type {
  ExitCodeValue,
  WorkItem,
  PreparedBatch,
  BatchResult,
  BatchHooks,
} from "./batch";
export { ExitCode } from "./batch";

// Plugin
export type { ConverterPlugin, ProgressCallback } from "./plugin";
