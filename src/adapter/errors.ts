/**
 * Error classes for conditions JavaScript does not raise on its own.
 *
 * `5 / 0` is Infinity in JavaScript, so code that treats division by zero
 * as a failure throws ZeroDivisionError explicitly; the adapter maps it to
 * StatusCode.ZERO_DIVISION.
 */

export class ZeroDivisionError extends RangeError {
  override readonly name = "ZeroDivisionError";

  constructor(message = "division by zero") {
    super(message);
  }
}

export class NotImplementedError extends Error {
  override readonly name = "NotImplementedError";

  constructor(message = "not implemented") {
    super(message);
  }
}
