// Error classes
export {
  StylescanError,
  ValidationError,
  ConfigError,
  FilesystemError,
  FileReadError,
  OutputWriteError,
  errorMessage,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { Logger, logger } from "./logger.js";
export type { LogLevel, LogSink } from "./logger.js";
