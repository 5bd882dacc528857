/**
 * Status: the immutable outcome of an operation.
 *
 * A Status is either OK or carries a failure code, a human-readable
 * message and an optional opaque payload. Whether a Status is OK is
 * decided by its code alone, never by its message.
 *
 * Dependencies: Types layer only.
 */

import { isDeepStrictEqual } from "node:util";
import { StatusCode, statusCodeName } from "./status-code.js";

/**
 * Optional extras attached to a Status at construction.
 */
export interface StatusInit {
  /** Opaque structured data describing the failure. */
  readonly payload?: unknown;
  /** Stack trace of the error the status was built from. */
  readonly stack?: string | undefined;
}

/**
 * Serialized form used by structured loggers.
 */
export interface StatusJson {
  readonly code: StatusCode;
  readonly name: string;
  readonly message: string;
  readonly payload?: unknown;
}

export class Status {
  readonly #code: StatusCode;
  readonly #message: string;
  readonly #payload: unknown;
  readonly #stack: string | undefined;

  constructor(
    code: StatusCode = StatusCode.OK,
    message = "",
    init?: StatusInit,
  ) {
    this.#code = code;
    this.#message = message;
    this.#payload = init?.payload;
    this.#stack = init?.stack;
    Object.freeze(this);
  }

  static fromStatusCode(
    code: StatusCode,
    message = "",
    init?: StatusInit,
  ): Status {
    return new Status(code, message, init);
  }

  ok(): boolean {
    return this.#code === StatusCode.OK;
  }

  code(): StatusCode {
    return this.#code;
  }

  message(): string {
    return this.#message;
  }

  payload(): unknown {
    return this.#payload;
  }

  stack(): string | undefined {
    return this.#stack;
  }

  /**
   * Structural equality on code, message and payload.
   * The stack trace is diagnostic and does not take part.
   */
  equals(other: Status): boolean {
    return (
      this.#code === other.#code &&
      this.#message === other.#message &&
      isDeepStrictEqual(this.#payload, other.#payload)
    );
  }

  toString(): string {
    if (this.ok()) {
      return "OK";
    }
    const name = statusCodeName(this.#code);
    return this.#message.length > 0 ? `${name}: ${this.#message}` : name;
  }

  toJSON(): StatusJson {
    const json: StatusJson = {
      code: this.#code,
      name: statusCodeName(this.#code),
      message: this.#message,
    };
    return this.#payload === undefined
      ? json
      : { ...json, payload: this.#payload };
  }
}

const OK_STATUS = new Status();

/**
 * The shared success status.
 */
export function okStatus(): Status {
  return OK_STATUS;
}

/**
 * Orders statuses by code, then by message.
 */
export function compareStatus(a: Status, b: Status): number {
  if (a.code() !== b.code()) {
    return a.code() < b.code() ? -1 : 1;
  }
  if (a.message() === b.message()) {
    return 0;
  }
  return a.message() < b.message() ? -1 : 1;
}

// ---------------------------------------------------------------------------
// Error factories
// ---------------------------------------------------------------------------

export type StatusFactory = (message?: string, init?: StatusInit) => Status;

function factoryFor(code: StatusCode): StatusFactory {
  return (message = "", init) => new Status(code, message, init);
}

export function customError(
  code: StatusCode,
  message = "",
  init?: StatusInit,
): Status {
  return new Status(code, message, init);
}

export const cancelledError = factoryFor(StatusCode.CANCELLED);
export const unknownError = factoryFor(StatusCode.UNKNOWN);
export const invalidArgumentError = factoryFor(StatusCode.INVALID_ARGUMENT);
export const deadlineExceededError = factoryFor(StatusCode.DEADLINE_EXCEEDED);
export const notFoundError = factoryFor(StatusCode.NOT_FOUND);
export const alreadyExistsError = factoryFor(StatusCode.ALREADY_EXISTS);
export const permissionDeniedError = factoryFor(StatusCode.PERMISSION_DENIED);
export const resourceExhaustedError = factoryFor(StatusCode.RESOURCE_EXHAUSTED);
export const failedPreconditionError = factoryFor(
  StatusCode.FAILED_PRECONDITION,
);
export const abortedError = factoryFor(StatusCode.ABORTED);
export const outOfRangeError = factoryFor(StatusCode.OUT_OF_RANGE);
export const unimplementedError = factoryFor(StatusCode.UNIMPLEMENTED);
export const internalError = factoryFor(StatusCode.INTERNAL);
export const unavailableError = factoryFor(StatusCode.UNAVAILABLE);
export const dataLossError = factoryFor(StatusCode.DATA_LOSS);
export const unauthenticatedError = factoryFor(StatusCode.UNAUTHENTICATED);
export const zeroDivisionError = factoryFor(StatusCode.ZERO_DIVISION);
