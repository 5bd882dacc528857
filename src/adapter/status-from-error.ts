/**
 * Thrown value to Status translation.
 */

import { Status } from "../types/status.js";
import {
  defaultErrorRegistry,
  stringField,
  type ErrorCodeRegistry,
} from "./error-registry.js";

export interface TranslateOptions {
  /** Lookup table for the status code. Defaults to defaultErrorRegistry. */
  readonly registry?: ErrorCodeRegistry | undefined;
  /** Attach the error's stack trace to the status. Defaults to true. */
  readonly includeStack?: boolean | undefined;
}

/**
 * Payload attached to statuses built from errors that carry a Node.js
 * style `code` (system errors such as ENOENT, or ERR_* codes).
 */
export interface ErrorCodePayload {
  readonly errorCode: string;
  readonly syscall?: string;
  readonly path?: string;
}

function errorCodePayload(error: Error): ErrorCodePayload | undefined {
  const errorCode = stringField(error, "code");
  if (errorCode === undefined) {
    return undefined;
  }
  const syscall = stringField(error, "syscall");
  const path = stringField(error, "path");
  return {
    errorCode,
    ...(syscall !== undefined ? { syscall } : {}),
    ...(path !== undefined ? { path } : {}),
  };
}

const UNPRINTABLE_MESSAGE = "non-Error value thrown";

/**
 * Text for a thrown value that is not an Error: its string `message`
 * field when it has one, else its string conversion. Objects without a
 * prototype, or whose conversion throws, get a fixed message.
 */
function describeThrown(thrown: unknown): string {
  if (typeof thrown === "object" && thrown !== null) {
    const message = stringField(thrown, "message");
    if (message !== undefined && message.length > 0) {
      return message;
    }
  }
  try {
    return String(thrown);
  } catch {
    return UNPRINTABLE_MESSAGE;
  }
}

/**
 * Builds the failing Status that stands for a thrown value.
 *
 * The message is the error's message, or its name when the message is
 * empty. Other thrown values are described by describeThrown; building
 * the status never throws.
 */
export function statusFromError(
  error: unknown,
  options: TranslateOptions = {},
): Status {
  const registry = options.registry ?? defaultErrorRegistry;
  const code = registry.lookup(error);
  if (!(error instanceof Error)) {
    return new Status(code, describeThrown(error));
  }
  const message = error.message.length > 0 ? error.message : error.name;
  return new Status(code, message, {
    payload: errorCodePayload(error),
    stack: options.includeStack === false ? undefined : error.stack,
  });
}
