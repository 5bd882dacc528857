/**
 * StatusOr<T>: a uniform handle over either a value or a failing Status.
 *
 * Never holds both, and never holds an OK status in place of a value.
 * Callers check ok() before val(); reading the value of a failure is a
 * programming error and trips the fatal check.
 *
 *   const port = StatusOr.from(parsePort(raw));
 *   if (!port.ok()) {
 *     return port.status();
 *   }
 *   listen(port.val());
 */

import { check } from "../log/check.js";
import { okStatus, type Status } from "./status.js";
import type { AStatusOrElse } from "./status-or-else.js";

export class StatusOr<T> {
  private constructor(private readonly result: AStatusOrElse<T>) {}

  static fromValue<T>(value: T): StatusOr<T> {
    return new StatusOr<T>({ ok: true, value });
  }

  static fromStatus<T = never>(status: Status): StatusOr<T> {
    check(!status.ok(), "StatusOr cannot be built from an OK status");
    return new StatusOr<T>({ ok: false, error: status });
  }

  static from<T>(result: AStatusOrElse<T>): StatusOr<T> {
    check(
      result.ok || !result.error.ok(),
      "StatusOr cannot be built from an OK status",
    );
    return new StatusOr<T>(result);
  }

  ok(): boolean {
    return this.result.ok;
  }

  val(): T {
    const result = this.result;
    check(
      result.ok,
      () => `val() called on a failed StatusOr (${this.status().toString()})`,
    );
    return result.value;
  }

  /**
   * The held failure, or the shared OK status when a value is present.
   */
  status(): Status {
    return this.result.ok ? okStatus() : this.result.error;
  }

  valueOr(fallback: T): T {
    return this.result.ok ? this.result.value : fallback;
  }

  toResult(): AStatusOrElse<T> {
    return this.result;
  }
}
