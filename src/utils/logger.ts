/**
 * Logger
 * Six levels from fatal to trace, matching the --verbose range 0-5.
 * Messages produced before the level is known are kept as DeferredLog
 * records and flushed once the logger exists.
 */

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = Pick<Console, "log" | "warn" | "error">;

// A message recorded before the logger exists
export interface DeferredLog {
  level: LogLevel;
  message: string;
}

/**
 * Map a verbosity (0-5) to the most detailed level that is still printed
 * Returns null for anything outside that range
 */
export function levelFromVerbosity(verbosity: number): LogLevel | null {
  if (!Number.isInteger(verbosity)) return null;
  return LOG_LEVELS[verbosity] ?? null;
}

export class Logger {
  constructor(
    private level: LogLevel = "error",
    private sink: LogSink = console,
  ) {}

  get threshold(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  fatal(message: string): void {
    this.sink.error(`[FATAL] ${message}`);
  }

  error(message: string, error?: Error): void {
    if (!this.isEnabled("error")) return;
    this.sink.error(`[ERROR] ${message}`);
    if (error) {
      this.sink.error(error);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      this.sink.warn(`[WARN] ${message}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      this.sink.log(`[INFO] ${message}`);
    }
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      this.sink.log(`[DEBUG] ${message}`);
    }
  }

  trace(message: string): void {
    if (this.isEnabled("trace")) {
      this.sink.log(`[TRACE] ${message}`);
    }
  }

  log(level: LogLevel, message: string): void {
    this[level](message);
  }

  flush(records: readonly DeferredLog[]): void {
    for (const record of records) {
      this.log(record.level, record.message);
    }
  }
}
