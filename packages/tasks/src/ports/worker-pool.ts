import type { SubmitOptions, Task } from "./task"

export type WorkerPoolConfig = {
  /** Prefix of worker slot names */
  name: string

  /** Max tasks running at once; an integer >= 1 */
  concurrency: number
}

/**
 * Fixed number of worker slots running submitted tasks in FIFO order.
 */
export interface WorkerPool {
  readonly name: string
  readonly concurrency: number

  /**
   * Queue `task` and resolve with its result. Rejects with the task's error,
   * with the abort reason if `options.signal` aborts while the task is still
   * queued, or with a `PoolError` once the pool is shut down.
   */
  submit<T>(task: Task<T>, options?: SubmitOptions): Promise<T>

  /** Stop accepting tasks and wait for queued and running ones to finish. */
  shutdown(): Promise<void>

  /** Tasks running now */
  readonly active: number

  /** Tasks waiting for a free slot */
  readonly pending: number

  readonly isShutDown: boolean
}
