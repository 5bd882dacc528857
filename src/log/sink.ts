/**
 * Logging sink.
 *
 * The only logging capability the status core consumes: emit one record
 * with a severity, a message and the call-site location. Sinks are
 * expected to serialize concurrent writes themselves.
 */

import {
  pino,
  type DestinationStream,
  type Level,
  type LevelWithSilent,
  type Logger,
} from "pino";
import { LogSeverity, severityLetter } from "./severity.js";
import type { SourceLocation } from "./location.js";

export interface LogSink {
  emit(severity: LogSeverity, message: string, location: SourceLocation): void;
}

export interface PinoSinkOptions {
  /** Minimum pino level written. Defaults to "info". */
  readonly level?: LevelWithSilent | undefined;
  /** Logger name, added to every record. */
  readonly name?: string | undefined;
  /** Where records go. Defaults to pino's stdout destination. */
  readonly destination?: DestinationStream | undefined;
}

const PINO_LEVELS: ReadonlyMap<LogSeverity, Level> = new Map([
  [LogSeverity.INFO, "info"],
  [LogSeverity.WARNING, "warn"],
  [LogSeverity.ERROR, "error"],
  [LogSeverity.FATAL, "fatal"],
]);

class PinoSink implements LogSink {
  constructor(private readonly logger: Logger) {}

  emit(severity: LogSeverity, message: string, location: SourceLocation): void {
    const level = PINO_LEVELS.get(severity) ?? "error";
    this.logger[level](
      {
        severity: severityLetter(severity),
        file: location.file,
        line: location.line,
        column: location.column,
      },
      message,
    );
    if (severity === LogSeverity.FATAL) {
      // The process exits right after a fatal record.
      this.logger.flush();
    }
  }
}

/**
 * Sink writing through an existing pino logger.
 */
export function pinoSinkFor(logger: Logger): LogSink {
  return new PinoSink(logger);
}

export function createPinoSink(options: PinoSinkOptions = {}): LogSink {
  const loggerOptions = {
    level: options.level ?? "info",
    ...(options.name !== undefined ? { name: options.name } : {}),
  };
  const logger = options.destination !== undefined
    ? pino(loggerOptions, options.destination)
    : pino(loggerOptions);
  return new PinoSink(logger);
}
