export {
  type ConsoleLoggerDeps,
  type ConsoleWriter,
  ConsoleLogger,
  createConsoleLogger,
} from "./adapters/console/console-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export {
  createErrorReporter,
  ErrorReporter,
  type ErrorReporterOptions,
  NON_CHAIN_ERROR_MESSAGE,
} from "./core/error-reporter"
export {
  type SerializedChainError,
  type SerializeLogErrorOptions,
  serializeLogError,
} from "./core/serialize-log-error"
export type {
  LogContext,
  LogContextPatch,
  LogEvent,
  LogMeta,
} from "./ports/log-context"
export { type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
