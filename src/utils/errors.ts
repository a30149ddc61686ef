/**
 * Error types
 * Every error here ends the run with a fatal exit code
 */

import { ZodError } from "zod";

export class ConverterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Malformed command line, e.g. a value-taking option without a value
export class ArgumentError extends ConverterError {}

export class ConfigFileError extends ConverterError {
  constructor(
    readonly path: string,
    details: string,
    options?: ErrorOptions,
  ) {
    super(`Error during parsing of configuration file "${path}": ${details}`, options);
  }
}

export class OutputDirectoryError extends ConverterError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(
      `Could not create output folder "${path}". Logged error is: ${describeError(cause)}`,
      { cause },
    );
  }
}

// Thrown by the plugin while it parsed its own options
export class PluginError extends ConverterError {}

/**
 * Single-line description of anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
