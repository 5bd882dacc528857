/**
 * In-memory log sink.
 *
 * Records every emitted entry in order. Used wherever a test needs to
 * observe what the fatal-check path logged.
 */

import type { LogSink } from "./sink.js";
import type { LogSeverity } from "./severity.js";
import type { SourceLocation } from "./location.js";

export interface LogRecord {
  readonly severity: LogSeverity;
  readonly message: string;
  readonly location: SourceLocation;
}

export interface MemorySink extends LogSink {
  readonly records: readonly LogRecord[];
  clear(): void;
}

export function createMemorySink(): MemorySink {
  const records: LogRecord[] = [];
  return {
    records,
    emit(severity, message, location) {
      records.push({ severity, message, location });
    },
    clear() {
      records.length = 0;
    },
  };
}
