/**
 * Batch data types
 */

export const ExitCode = {
  Success: 0,
  UnrecognizedOptions: 1,
  PartialFailure: 2,
  Fatal: -1,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface WorkItem {
  readonly inputPath: string;
  readonly outputDirectory: string;
}

export interface PreparedBatch {
  items: WorkItem[];
  // Inputs that were skipped before conversion (missing files)
  failures: string[];
}

export interface BatchResult {
  exitCode: ExitCodeValue;
  converted: number;
  failures: number;
  aborted: boolean;
}

export interface BatchHooks {
  onConverted?(item: WorkItem): void;
  onFailed?(item: WorkItem, error: unknown): void;
}
