/**
 * Status codes carried by every Status.
 *
 * The catalogue has three bands:
 *   - 0..16: the canonical, domain-agnostic codes (OK is 0)
 *   - 100+:  JavaScript built-in error categories
 *   - 120+:  Node.js system error categories (errno-style `error.code`)
 *
 * ZERO_DIVISION (-1) is the one custom code; JavaScript never raises on
 * division by zero, so it is produced only from ZeroDivisionError.
 */

export const StatusCode = {
  OK: 0,
  CANCELLED: 1,
  UNKNOWN: 2,
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  ALREADY_EXISTS: 6,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  FAILED_PRECONDITION: 9,
  ABORTED: 10,
  OUT_OF_RANGE: 11,
  UNIMPLEMENTED: 12,
  INTERNAL: 13,
  UNAVAILABLE: 14,
  DATA_LOSS: 15,
  UNAUTHENTICATED: 16,

  ZERO_DIVISION: -1,

  EVAL_ERROR: 100,
  RANGE_ERROR: 101,
  REFERENCE_ERROR: 102,
  SYNTAX_ERROR: 103,
  TYPE_ERROR: 104,
  URI_ERROR: 105,
  AGGREGATE_ERROR: 106,

  FILE_NOT_FOUND: 120,
  FILE_EXISTS: 121,
  PERMISSION_ERROR: 122,
  IS_A_DIRECTORY: 123,
  NOT_A_DIRECTORY: 124,
  DIRECTORY_NOT_EMPTY: 125,
  BROKEN_PIPE: 126,
  CONNECTION_REFUSED: 127,
  CONNECTION_RESET: 128,
  CONNECTION_ABORTED: 129,
  TIMEOUT: 130,
  INTERRUPTED: 131,
  TOO_MANY_OPEN_FILES: 132,
} as const;

export type StatusCodeName = keyof typeof StatusCode;

export type StatusCode = (typeof StatusCode)[StatusCodeName];

const NAMES_BY_CODE: ReadonlyMap<number, string> = new Map(
  Object.entries(StatusCode).map(([name, code]) => [code, name] as const),
);

/**
 * Returns the member name of a status code, e.g. "NOT_FOUND".
 */
export function statusCodeName(code: StatusCode): string {
  const name = NAMES_BY_CODE.get(code);
  // Every StatusCode value is a key of NAMES_BY_CODE.
  return name ?? "UNKNOWN";
}

export function isStatusCode(value: unknown): value is StatusCode {
  return typeof value === "number" && NAMES_BY_CODE.has(value);
}
