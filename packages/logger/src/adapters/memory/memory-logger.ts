import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { LEVEL_SEVERITY, type LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type LogEntry = {
  level: LogLevelName
  message: string

  /** Bound context merged with per-call meta (meta wins) */
  fields: Record<string, unknown>
}

/**
 * Keeps entries in memory. Children share their parent's entry list.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly context: LogContextPatch = {},
    private readonly sink: LogEntry[] = [],
  ) {}

  /** Entries written by this logger and every logger derived from it */
  get entries(): readonly LogEntry[] {
    return this.sink
  }

  clear(): void {
    this.sink.length = 0
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(this.opts, { ...this.context, ...context }, this.sink)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    if (LEVEL_SEVERITY[level] < LEVEL_SEVERITY[this.opts.level ?? "trace"]) return

    this.sink.push({ level, message, fields: { ...this.context, ...meta } })
  }
}
