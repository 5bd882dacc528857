/**
 * Fatal checks.
 *
 * A failed check means the program reached a state it must never reach:
 * continuing would be worse than stopping. The failure is not a Status
 * and is never returned to the caller. Instead one FATAL record (message
 * plus the location of the failed check) goes through the log sink and
 * the process terminates.
 *
 * Recoverable failures belong in a returned Status, not here.
 */

import { LogSeverity } from "./severity.js";
import {
  callerLocation,
  UNKNOWN_LOCATION,
  type SourceLocation,
} from "./location.js";
import { createPinoSink, type LogSink } from "./sink.js";
import { loadConfig } from "../config/load-config.js";
import { DEFAULT_CONFIG } from "../types/config.js";

/**
 * Ends the process with the given exit code. The default calls
 * process.exit; tests install one that records the call and returns.
 */
export type Terminator = (exitCode: number) => void;

export interface CheckOptions {
  readonly sink?: LogSink | undefined;
  readonly terminate?: Terminator | undefined;
  readonly exitCode?: number | undefined;
  readonly debugChecks?: boolean | undefined;
}

/**
 * Raised only when an installed terminator returns instead of ending the
 * process. The status adapter lets it through untouched.
 */
export class FatalCheckError extends Error {
  override readonly name = "FatalCheckError";

  constructor(
    message: string,
    readonly location: SourceLocation,
  ) {
    super(message);
  }
}

export type CheckMessage = string | (() => string);

interface CheckSettings {
  readonly sink: LogSink;
  readonly terminate: Terminator;
  readonly exitCode: number;
  readonly debugChecks: boolean;
}

let overrides: CheckOptions = {};
let resolved: CheckSettings | undefined;
let terminating = false;

function resolveSettings(options: CheckOptions): CheckSettings {
  const loaded = loadConfig();
  const config = loaded.ok ? loaded.value : DEFAULT_CONFIG;
  const sink = options.sink ?? createPinoSink({ level: config.logLevel });
  if (!loaded.ok) {
    sink.emit(
      LogSeverity.WARNING,
      `${loaded.error.toString()}; falling back to defaults`,
      UNKNOWN_LOCATION,
    );
  }
  return {
    sink,
    terminate: options.terminate ?? ((code) => process.exit(code)),
    exitCode: options.exitCode ?? config.fatalExitCode,
    debugChecks: options.debugChecks ?? config.debugChecks,
  };
}

function settings(): CheckSettings {
  if (resolved === undefined) {
    resolved = resolveSettings(overrides);
  }
  return resolved;
}

/**
 * Replaces parts of the check configuration. Unset fields keep their
 * current override, or fall back to the environment configuration.
 */
export function configureChecks(options: CheckOptions): void {
  overrides = { ...overrides, ...options };
  resolved = undefined;
}

export function resetChecks(): void {
  overrides = {};
  resolved = undefined;
  terminating = false;
}

function terminate(text: string, location: SourceLocation): never {
  const current = settings();
  if (terminating) {
    // A check failed inside the sink or the terminator; the outer call
    // logs once and ends the process once.
    throw new FatalCheckError(text, location);
  }
  terminating = true;
  try {
    current.sink.emit(LogSeverity.FATAL, text, location);
  } finally {
    try {
      current.terminate(current.exitCode);
    } finally {
      terminating = false;
    }
  }
  throw new FatalCheckError(text, location);
}

function render(message: CheckMessage): string {
  return typeof message === "string" ? message : message();
}

// ---------------------------------------------------------------------------
// Public checks
// ---------------------------------------------------------------------------

/**
 * Terminates the process unless `condition` holds.
 * The message is rendered only on failure.
 */
export function check(
  condition: boolean,
  message: CheckMessage = "condition is false",
): asserts condition {
  if (!condition) {
    terminate(`Check failed: ${render(message)}`, callerLocation(check));
  }
}

export function checkEq<T>(
  actual: T,
  expected: T,
  message?: CheckMessage,
): void {
  if (actual !== expected) {
    const text = message !== undefined
      ? render(message)
      : `${String(actual)} is not equal to ${String(expected)}`;
    terminate(`Check failed: ${text}`, callerLocation(checkEq));
  }
}

export function checkNe<T>(
  actual: T,
  unexpected: T,
  message?: CheckMessage,
): void {
  if (actual === unexpected) {
    const text = message !== undefined
      ? render(message)
      : `${String(actual)} is equal to ${String(unexpected)}`;
    terminate(`Check failed: ${text}`, callerLocation(checkNe));
  }
}

export function checkDefined<T>(
  value: T,
  message: CheckMessage = "value should not be null or undefined",
): asserts value is NonNullable<T> {
  if (value === null || value === undefined) {
    terminate(`Check failed: ${render(message)}`, callerLocation(checkDefined));
  }
}

/**
 * Checks that `value` is one of the values of an `as const` enum object.
 */
export function checkInEnum(
  value: unknown,
  enumObject: Readonly<Record<string, string | number>>,
  enumName = "enum",
): void {
  if (!Object.values(enumObject).some((member) => member === value)) {
    terminate(
      `Check failed: value ${String(value)} is not a valid member of ${enumName}`,
      callerLocation(checkInEnum),
    );
  }
}

/**
 * Debug-only check. Neither thunk is evaluated when debug checks are off
 * (STATUSKIT_DEBUG_CHECKS=false, or NODE_ENV=production by default).
 */
export function dcheck(
  condition: () => boolean,
  message?: () => string,
): void {
  if (settings().debugChecks && !condition()) {
    const text = message !== undefined ? message() : "debug check failed";
    terminate(`Check failed: ${text}`, callerLocation(dcheck));
  }
}

/**
 * Logs `message` at FATAL severity and terminates the process.
 */
export function fatal(message: string): never {
  return terminate(message, callerLocation(fatal));
}
