export { LogSeverity, severityLetter } from "./severity.js";
export {
  type SourceLocation,
  UNKNOWN_LOCATION,
  callerLocation,
  parseStackFrame,
  formatLocation,
} from "./location.js";
export {
  type LogSink,
  type PinoSinkOptions,
  createPinoSink,
  pinoSinkFor,
} from "./sink.js";
export {
  type LogRecord,
  type MemorySink,
  createMemorySink,
} from "./memory-sink.js";
export {
  type Terminator,
  type CheckOptions,
  type CheckMessage,
  FatalCheckError,
  configureChecks,
  resetChecks,
  check,
  checkEq,
  checkNe,
  checkDefined,
  checkInEnum,
  dcheck,
  fatal,
} from "./check.js";
