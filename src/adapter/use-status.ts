/**
 * Status adapter.
 *
 * Wraps a function whose body may still throw so that it honors the
 * AStatusOrElse<T> contract instead:
 *   - a normal return is passed through unchanged
 *   - a thrown value becomes a failing Status (see statusFromError)
 *   - FatalCheckError is never converted; a failed check stays fatal
 *
 *   const divide = useStatus((a: number, b: number): AStatusOrElse<number> => {
 *     if (b === 0) {
 *       throw new ZeroDivisionError();
 *     }
 *     return success(a / b);
 *   });
 *
 * The adapter keeps no state and does not log.
 */

import { check, FatalCheckError } from "../log/check.js";
import { okStatus, Status } from "../types/status.js";
import {
  failure,
  success,
  type AStatusOrElse,
  type Failure,
} from "../types/status-or-else.js";
import { statusFromError, type TranslateOptions } from "./status-from-error.js";

export type UseStatusOptions = TranslateOptions;

function translate(error: unknown, options: UseStatusOptions): Failure {
  if (error instanceof FatalCheckError) {
    throw error;
  }
  return failure(statusFromError(error, options));
}

function honorContract<T>(result: AStatusOrElse<T>): AStatusOrElse<T> {
  check(
    result.ok || !result.error.ok(),
    "adapted function returned a failure holding an OK status",
  );
  return result;
}

/**
 * Adapts a function declared to return AStatusOrElse<T>.
 */
export function useStatus<This, A extends unknown[], T>(
  fn: (this: This, ...args: A) => AStatusOrElse<T>,
  options: UseStatusOptions = {},
): (this: This, ...args: A) => AStatusOrElse<T> {
  return function (this: This, ...args: A): AStatusOrElse<T> {
    let result: AStatusOrElse<T>;
    try {
      result = fn.apply(this, args);
    } catch (error: unknown) {
      return translate(error, options);
    }
    return honorContract(result);
  };
}

/**
 * Adapts a legacy function that returns a plain value and throws on
 * failure.
 */
export function useStatusValue<This, A extends unknown[], T>(
  fn: (this: This, ...args: A) => T,
  options: UseStatusOptions = {},
): (this: This, ...args: A) => AStatusOrElse<T> {
  return function (this: This, ...args: A): AStatusOrElse<T> {
    try {
      return success(fn.apply(this, args));
    } catch (error: unknown) {
      return translate(error, options);
    }
  };
}

/**
 * Adapts a function with no result. The adapted function returns OK on a
 * normal return, passes through a Status the function returns itself,
 * and returns the translated failure when it throws.
 */
export function useStatusVoid<This, A extends unknown[]>(
  fn: (this: This, ...args: A) => Status | void,
  options: UseStatusOptions = {},
): (this: This, ...args: A) => Status {
  return function (this: This, ...args: A): Status {
    let returned: Status | void;
    try {
      returned = fn.apply(this, args);
    } catch (error: unknown) {
      return translate(error, options).error;
    }
    return returned instanceof Status ? returned : okStatus();
  };
}

/**
 * Promise variant of useStatus. The returned promise resolves with the
 * failure arm instead of rejecting; it rejects only with FatalCheckError.
 */
export function useStatusAsync<This, A extends unknown[], T>(
  fn: (this: This, ...args: A) => Promise<AStatusOrElse<T>>,
  options: UseStatusOptions = {},
): (this: This, ...args: A) => Promise<AStatusOrElse<T>> {
  return async function (this: This, ...args: A): Promise<AStatusOrElse<T>> {
    let result: AStatusOrElse<T>;
    try {
      result = await fn.apply(this, args);
    } catch (error: unknown) {
      return translate(error, options);
    }
    return honorContract(result);
  };
}
