export {
  StatusCode,
  type StatusCodeName,
  statusCodeName,
  isStatusCode,
} from "./status-code.js";
export {
  Status,
  type StatusInit,
  type StatusJson,
  type StatusFactory,
  okStatus,
  compareStatus,
  customError,
  cancelledError,
  unknownError,
  invalidArgumentError,
  deadlineExceededError,
  notFoundError,
  alreadyExistsError,
  permissionDeniedError,
  resourceExhaustedError,
  failedPreconditionError,
  abortedError,
  outOfRangeError,
  unimplementedError,
  internalError,
  unavailableError,
  dataLossError,
  unauthenticatedError,
  zeroDivisionError,
} from "./status.js";
export {
  type AStatusOrElse,
  type Success,
  type Failure,
  success,
  failure,
  toStatusOrElse,
  isStatusOrElse,
} from "./status-or-else.js";
export { StatusOr } from "./status-or.js";
export { type StatuskitConfig, DEFAULT_CONFIG } from "./config.js";
