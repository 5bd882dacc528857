/**
 * Error-to-status-code registry.
 *
 * The explicit lookup table the status adapter uses to classify a thrown
 * value. Three tables are consulted in order:
 *   1. Node.js system error codes (`error.code`, e.g. "ENOENT")
 *   2. error classes, most specific first along the prototype chain
 *   3. error names (`error.name`, for DOMException-style errors)
 * Anything unmatched maps to UNKNOWN.
 */

import { checkNe } from "../log/check.js";
import { StatusCode } from "../types/status-code.js";
import { NotImplementedError, ZeroDivisionError } from "./errors.js";

export type ErrorClass = abstract new (...args: never[]) => Error;

export class ErrorCodeRegistry {
  private readonly byPrototype: Map<unknown, StatusCode> = new Map();
  private readonly bySystemCode: Map<string, StatusCode> = new Map();
  private readonly byName: Map<string, StatusCode> = new Map();

  /**
   * Map an error class, and every subclass without a mapping of its own,
   * to a code. Registering a class again replaces its mapping.
   */
  register(errorClass: ErrorClass, code: StatusCode): this {
    checkNe(code, StatusCode.OK, "an error class cannot map to OK");
    this.byPrototype.set(errorClass.prototype, code);
    return this;
  }

  /**
   * Map a Node.js system error code such as "ENOENT".
   */
  registerSystemCode(systemCode: string, code: StatusCode): this {
    checkNe(code, StatusCode.OK, "a system error code cannot map to OK");
    this.bySystemCode.set(systemCode, code);
    return this;
  }

  /**
   * Map an `error.name` such as "AbortError".
   */
  registerName(name: string, code: StatusCode): this {
    checkNe(code, StatusCode.OK, "an error name cannot map to OK");
    this.byName.set(name, code);
    return this;
  }

  lookup(error: unknown): StatusCode {
    if (typeof error !== "object" || error === null) {
      return StatusCode.UNKNOWN;
    }

    const systemCode = stringField(error, "code");
    const bySystemCode = systemCode !== undefined
      ? this.bySystemCode.get(systemCode)
      : undefined;
    if (bySystemCode !== undefined) {
      return bySystemCode;
    }

    let prototype: unknown = Object.getPrototypeOf(error);
    while (prototype !== null && prototype !== undefined) {
      const byClass = this.byPrototype.get(prototype);
      if (byClass !== undefined) {
        return byClass;
      }
      prototype = Object.getPrototypeOf(prototype);
    }

    const name = stringField(error, "name");
    const byName = name !== undefined ? this.byName.get(name) : undefined;
    return byName ?? StatusCode.UNKNOWN;
  }
}

/**
 * Reads a string-valued property, or undefined when absent, not a string,
 * or guarded by a getter that throws.
 */
export function stringField(value: object, key: string): string | undefined {
  let field: unknown;
  try {
    field = Reflect.get(value, key);
  } catch {
    return undefined;
  }
  return typeof field === "string" ? field : undefined;
}

// ---------------------------------------------------------------------------
// Default table
// ---------------------------------------------------------------------------

const SYSTEM_CODES: readonly (readonly [string, StatusCode])[] = [
  ["ENOENT", StatusCode.FILE_NOT_FOUND],
  ["EEXIST", StatusCode.FILE_EXISTS],
  ["EACCES", StatusCode.PERMISSION_ERROR],
  ["EPERM", StatusCode.PERMISSION_ERROR],
  ["EISDIR", StatusCode.IS_A_DIRECTORY],
  ["ENOTDIR", StatusCode.NOT_A_DIRECTORY],
  ["ENOTEMPTY", StatusCode.DIRECTORY_NOT_EMPTY],
  ["EPIPE", StatusCode.BROKEN_PIPE],
  ["ECONNREFUSED", StatusCode.CONNECTION_REFUSED],
  ["ECONNRESET", StatusCode.CONNECTION_RESET],
  ["ECONNABORTED", StatusCode.CONNECTION_ABORTED],
  ["ETIMEDOUT", StatusCode.TIMEOUT],
  ["EINTR", StatusCode.INTERRUPTED],
  ["EMFILE", StatusCode.TOO_MANY_OPEN_FILES],
  ["ENFILE", StatusCode.TOO_MANY_OPEN_FILES],
];

export function createDefaultRegistry(): ErrorCodeRegistry {
  const registry = new ErrorCodeRegistry()
    .register(EvalError, StatusCode.EVAL_ERROR)
    .register(RangeError, StatusCode.RANGE_ERROR)
    .register(ReferenceError, StatusCode.REFERENCE_ERROR)
    .register(SyntaxError, StatusCode.SYNTAX_ERROR)
    .register(TypeError, StatusCode.TYPE_ERROR)
    .register(URIError, StatusCode.URI_ERROR)
    .register(AggregateError, StatusCode.AGGREGATE_ERROR)
    .register(ZeroDivisionError, StatusCode.ZERO_DIVISION)
    .register(NotImplementedError, StatusCode.UNIMPLEMENTED)
    .registerName("AbortError", StatusCode.CANCELLED)
    .registerName("TimeoutError", StatusCode.DEADLINE_EXCEEDED);
  for (const [systemCode, code] of SYSTEM_CODES) {
    registry.registerSystemCode(systemCode, code);
  }
  return registry;
}

/**
 * Registry used by the adapter when none is passed explicitly.
 * Extend it at startup to classify application error classes.
 */
export const defaultErrorRegistry: ErrorCodeRegistry = createDefaultRegistry();
