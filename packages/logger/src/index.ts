export {
  type ConsoleLoggerDeps,
  ConsoleLogger,
  type ConsoleWriter,
  createConsoleLogger,
} from "./adapters/console/console-logger"
export { type LogEntry, MemoryLogger } from "./adapters/memory/memory-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type {
  LogContext,
  LogContextPatch,
  LogEvent,
  LogMeta,
  LogOutcome,
} from "./ports/log-context"
export {
  LEVEL_SEVERITY,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  logLevelNames,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
