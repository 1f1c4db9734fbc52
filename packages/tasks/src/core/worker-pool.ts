import { AsyncResource } from "node:async_hooks"
import { randomBytes } from "node:crypto"
import { SystemClock, type TimeSource } from "@strata/clock"
import { createNullLogger, type Logger } from "@strata/logger"
import type { SubmitOptions, Task } from "../ports/task"
import type { WorkerPool, WorkerPoolConfig } from "../ports/worker-pool"
import { PoolError } from "./pool-error"

export type WorkerPoolDeps = {
  logger?: Logger
  clock?: TimeSource
}

type QueuedTask = {
  /**
   * Runs the task in the async context of its `submit()` call; the returned
   * thunk settles the submitter's promise.
   */
  start: (worker: string) => Promise<() => void>
}

export function createWorkerPool(config: WorkerPoolConfig, deps: WorkerPoolDeps = {}): WorkerPool {
  return new QueueWorkerPool(config, deps)
}

class QueueWorkerPool implements WorkerPool {
  readonly name: string
  readonly concurrency: number

  private readonly idle: string[]
  private readonly queue: QueuedTask[] = []
  private readonly drainWaiters: (() => void)[] = []
  private readonly logger: Logger
  private readonly clock: TimeSource
  private running = 0
  private stopped = false

  constructor(config: WorkerPoolConfig, deps: WorkerPoolDeps) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new RangeError(`concurrency must be an integer >= 1 (got ${config.concurrency})`)
    }

    this.name = config.name
    this.concurrency = config.concurrency
    this.idle = Array.from({ length: config.concurrency }, () => workerName(config.name))
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "tasks",
      pool: config.name,
    })
  }

  get active(): number {
    return this.running
  }

  get pending(): number {
    return this.queue.length
  }

  get isShutDown(): boolean {
    return this.stopped
  }

  submit<T>(task: Task<T>, options: SubmitOptions = {}): Promise<T> {
    if (this.stopped) {
      return Promise.reject(PoolError.shutDown(this.name))
    }

    const signal = options.signal ?? new AbortController().signal

    if (signal.aborted) {
      return Promise.reject(signal.reason)
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(entry)
        if (index === -1) return

        this.queue.splice(index, 1)
        this.logger.debug("Skipped task aborted while queued")
        reject(signal.reason)
        this.notifyIfDrained()
      }

      const entry: QueuedTask = {
        start: AsyncResource.bind(async (worker: string) => {
          signal.removeEventListener("abort", onAbort)
          const startedAt = this.clock.nowMs()

          try {
            const value = await task({ worker, signal })

            this.logger.debug("Task completed", {
              worker,
              durationMs: this.clock.nowMs() - startedAt,
            })

            return () => resolve(value)
          } catch (err) {
            this.logger.debug("Task failed", {
              worker,
              durationMs: this.clock.nowMs() - startedAt,
              err,
            })

            return () => reject(err)
          }
        }),
      }

      signal.addEventListener("abort", onAbort, { once: true })
      this.queue.push(entry)
      this.dispatch()
    })
  }

  shutdown(): Promise<void> {
    if (!this.stopped) {
      this.stopped = true
      this.logger.info("Shutting down", { active: this.running, pending: this.queue.length })
    }

    if (this.isDrained()) return Promise.resolve()

    return new Promise((resolve) => {
      this.drainWaiters.push(resolve)
    })
  }

  private dispatch(): void {
    let worker = this.idle.shift()

    while (worker !== undefined) {
      const entry = this.queue.shift()

      if (!entry) {
        this.idle.unshift(worker)
        return
      }

      this.running++
      void this.run(worker, entry)

      worker = this.idle.shift()
    }
  }

  private async run(worker: string, entry: QueuedTask): Promise<void> {
    const settle = await entry.start(worker)

    this.running--
    this.idle.push(worker)
    settle()

    this.dispatch()
    this.notifyIfDrained()
  }

  private isDrained(): boolean {
    return this.running === 0 && this.queue.length === 0
  }

  private notifyIfDrained(): void {
    if (!this.stopped || !this.isDrained()) return

    this.logger.debug("Drained")

    for (const resolve of this.drainWaiters.splice(0)) resolve()
  }
}

function workerName(pool: string): string {
  return `${pool}-${randomBytes(3).toString("hex")}`
}
