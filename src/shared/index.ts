export { createLogger, parseLogLevel, redactSecrets, registerSecret } from "./debug-log.js";
export type { Logger, LogLevel } from "./debug-log.js";
export {
  ConversionError,
  errnoCode,
  errorMessage,
  isConversionError,
  toConversionError,
} from "./errors.js";
export type { ConversionErrorKind } from "./errors.js";
export { throwIfCancelled } from "./cancellation.js";
