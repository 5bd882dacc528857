export { ZeroDivisionError, NotImplementedError } from "./errors.js";
export {
  type ErrorClass,
  ErrorCodeRegistry,
  createDefaultRegistry,
  defaultErrorRegistry,
} from "./error-registry.js";
export {
  type TranslateOptions,
  type ErrorCodePayload,
  statusFromError,
} from "./status-from-error.js";
export {
  type UseStatusOptions,
  useStatus,
  useStatusValue,
  useStatusVoid,
  useStatusAsync,
} from "./use-status.js";
