/**
 * AStatusOrElse<T>: the return contract of fallible functions.
 *
 * A function declared to return AStatusOrElse<T> signals success with a
 * value and failure with a non-OK Status. The two arms are tagged by `ok`
 * so callers branch without inspecting runtime types:
 *
 *   const result = parsePort(raw);
 *   if (!result.ok) {
 *     return result;
 *   }
 *   use(result.value);
 *
 * A failure arm holding an OK status is a contract violation and trips
 * the fatal check.
 */

import { check } from "../log/check.js";
import { Status } from "./status.js";

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  readonly error: Status;
}

export type AStatusOrElse<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(status: Status): Failure {
  check(!status.ok(), "failure() requires a non-OK status");
  return { ok: false, error: status };
}

/**
 * Lifts the loose "return a value or a Status" convention into the tagged
 * union: any Status becomes the failure arm, everything else a success.
 */
export function toStatusOrElse<T>(raw: T | Status): AStatusOrElse<T> {
  if (raw instanceof Status) {
    return failure(raw);
  }
  return success(raw);
}

export function isStatusOrElse(value: unknown): value is AStatusOrElse<unknown> {
  if (typeof value !== "object" || value === null || !("ok" in value)) {
    return false;
  }
  if (value.ok === true) {
    return "value" in value;
  }
  return (
    value.ok === false &&
    "error" in value &&
    value.error instanceof Status &&
    !value.error.ok()
  );
}
