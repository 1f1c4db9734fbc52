import { memoize } from "@strata/memo"
import { createWorkerPool, invokeAllTimed } from "@strata/tasks"
import { bigFib } from "../model/fibonacci"
import type { DemoSection } from "../section"

export const fibonacciSection: DemoSection = {
  name: "fibonacci",
  run: async ({ config, services }) => {
    const { logger, clock } = services
    const fib = memoize((n: number) => bigFib(n), {}, { logger, clock })
    const pool = createWorkerPool(
      { name: config.pool.name, concurrency: config.pool.size },
      { logger, clock },
    )

    try {
      const tasks = config.demo.fibInputs.map((n) => () => fib(n))
      const results = await invokeAllTimed(pool, tasks, config.demo.batchTimeoutMs, {
        clock,
        logger,
      })

      return [`Fibonacci (memoized): [${results.join(", ")}]`]
    } finally {
      await pool.shutdown()
    }
  },
}
