/**
 * Well-known fields bound to a logger through `child()`.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Logical operation, e.g. "memo.get" or "tasks.invokeAllTimed" */
  operation: string

  /** Worker pool name and the worker slot running a task */
  pool: string
  worker: string
}

export type LogOutcome = {
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added or overridden by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
