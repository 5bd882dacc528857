/**
 * Log severities understood by every sink.
 *
 * FATAL is reserved for records emitted right before the process is
 * terminated by a failed check.
 */

export const LogSeverity = {
  INFO: 0,
  WARNING: 1,
  ERROR: 2,
  FATAL: 3,
} as const;

export type LogSeverity = (typeof LogSeverity)[keyof typeof LogSeverity];

const LETTERS: ReadonlyMap<LogSeverity, string> = new Map([
  [LogSeverity.INFO, "I"],
  [LogSeverity.WARNING, "W"],
  [LogSeverity.ERROR, "E"],
  [LogSeverity.FATAL, "F"],
]);

/**
 * Single-letter tag for a severity ("I", "W", "E", "F").
 */
export function severityLetter(severity: LogSeverity): string {
  return LETTERS.get(severity) ?? "?";
}
