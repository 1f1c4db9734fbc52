export type TaskContext = {
  /** Worker slot running the task, e.g. "worker-3f9a1c" */
  worker: string

  /**
   * Aborts when the submitter gives up on the task. Long-running tasks
   * should check it and stop early.
   */
  signal: AbortSignal
}

export type Task<T> = (ctx: TaskContext) => T | Promise<T>

export type SubmitOptions = {
  /** A task still queued when this aborts never starts. */
  signal?: AbortSignal
}

export type TaskOutcome<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: unknown }
  | { status: "unfinished" }
