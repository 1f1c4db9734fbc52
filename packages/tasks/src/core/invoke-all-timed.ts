import type { Milliseconds, Sleeper } from "@strata/clock"
import { createNullLogger, type Logger } from "@strata/logger"
import type { Task, TaskOutcome } from "../ports/task"
import type { WorkerPool } from "../ports/worker-pool"

export type InvokeAllTimedDeps = {
  clock: Sleeper
  logger?: Logger
}

/**
 * Submit every task to `pool` and wait at most `timeoutMs` for them.
 *
 * Returns one outcome per task, in task order. Tasks still queued or running
 * at the deadline come back `unfinished` and their signal is aborted, so
 * queued ones never start.
 */
export async function invokeAllSettledTimed<T>(
  pool: WorkerPool,
  tasks: readonly Task<T>[],
  timeoutMs: Milliseconds,
  deps: InvokeAllTimedDeps,
): Promise<TaskOutcome<T>[]> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new RangeError(`timeoutMs must be a finite number >= 0 (got ${timeoutMs})`)
  }

  const logger = (deps.logger ?? createNullLogger()).child({
    module: "tasks",
    operation: "tasks.invokeAllSettledTimed",
  })

  const batch = new AbortController()
  const timer = new AbortController()
  const outcomes: TaskOutcome<T>[] = tasks.map((): TaskOutcome<T> => ({ status: "unfinished" }))

  const settled = Promise.all(
    tasks.map(async (task, index) => {
      try {
        const value = await pool.submit(task, { signal: batch.signal })
        outcomes[index] = { status: "fulfilled", value }
      } catch (error) {
        outcomes[index] = { status: "rejected", error }
      }
    }),
  )

  await Promise.race([settled, deps.clock.sleep(timeoutMs, timer.signal)])
  timer.abort()

  const snapshot = outcomes.slice()
  const unfinished = snapshot.filter((o) => o.status === "unfinished").length

  if (unfinished > 0) {
    batch.abort(new DOMException("Batch deadline exceeded", "TimeoutError"))
    logger.info("Deadline reached with unfinished tasks", { unfinished, timeoutMs })
  }

  return snapshot
}

/**
 * Like {@link invokeAllSettledTimed}, but returns only the values of tasks
 * that succeeded in time, in task order. Failures are logged at warn and
 * dropped.
 *
 * @example
 * ```ts
 * const values = await invokeAllTimed(pool, inputs.map((n) => () => fib(n)), 5_000, { clock })
 * ```
 */
export async function invokeAllTimed<T>(
  pool: WorkerPool,
  tasks: readonly Task<T>[],
  timeoutMs: Milliseconds,
  deps: InvokeAllTimedDeps,
): Promise<T[]> {
  const logger = (deps.logger ?? createNullLogger()).child({
    module: "tasks",
    operation: "tasks.invokeAllTimed",
  })

  const outcomes = await invokeAllSettledTimed(pool, tasks, timeoutMs, deps)
  const values: T[] = []

  for (const [index, outcome] of outcomes.entries()) {
    if (outcome.status === "fulfilled") {
      values.push(outcome.value)
    } else if (outcome.status === "rejected") {
      logger.warn("Task failed; excluded from results", { task: index, err: outcome.error })
    }
  }

  return values
}
