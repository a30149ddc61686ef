import type { TimeDisplayFormat } from "../types";

/**
 * Pick the time display format from the first character of the option value
 * (u = UTC, p = local PC time, anything else = the logger's local time)
 */
export function parseTimeDisplay(value: string | undefined): TimeDisplayFormat {
  switch (value?.charAt(0)) {
    case "u":
      return "utc";
    case "p":
      return "pc-local";
    default:
      return "logger-local";
  }
}

/**
 * Format a timestamp for display
 *
 * Plain files carry no logger time zone, so logger-local falls back to the
 * PC's offset written out explicitly.
 */
export function formatTimestamp(date: Date, format: TimeDisplayFormat): string {
  switch (format) {
    case "utc":
      return date.toISOString();
    case "pc-local":
      return date.toLocaleString();
    case "logger-local": {
      const offset = -date.getTimezoneOffset();
      const sign = offset >= 0 ? "+" : "-";
      const hours = String(Math.floor(Math.abs(offset) / 60)).padStart(2, "0");
      const minutes = String(Math.abs(offset) % 60).padStart(2, "0");
      const local = new Date(date.getTime() + offset * 60_000)
        .toISOString()
        .replace("Z", "");
      return `${local}${sign}${hours}:${minutes}`;
    }
  }
}
