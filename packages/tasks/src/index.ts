export {
  type InvokeAllTimedDeps,
  invokeAllSettledTimed,
  invokeAllTimed,
} from "./core/invoke-all-timed"
export { PoolError, type PoolErrorCode } from "./core/pool-error"
export { type SupplyWithFallbackOptions, supplyWithFallback } from "./core/supply-with-fallback"
export { createWorkerPool, type WorkerPoolDeps } from "./core/worker-pool"
export type { SubmitOptions, Task, TaskContext, TaskOutcome } from "./ports/task"
export type { WorkerPool, WorkerPoolConfig } from "./ports/worker-pool"
