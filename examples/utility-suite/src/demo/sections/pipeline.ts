import { BaseError } from "@strata/errors"
import { createWorkerPool, supplyWithFallback } from "@strata/tasks"
import type { DemoSection } from "../section"

export const pipelineSection: DemoSection = {
  name: "pipeline",
  run: async ({ services, random }) => {
    const single = createWorkerPool({ name: "single", concurrency: 1 }, services)

    try {
      const result = await supplyWithFallback(
        () => {
          if (random() < 0.5) {
            throw new BaseError("random failure", { code: "random_failure", isRetryable: true })
          }
          return "payload"
        },
        (payload) => `mapped:${payload.toUpperCase()}`,
        (err) => `fallback:${err.message}`,
        { pool: single },
      )

      return [`Pipeline result: ${result}`]
    } finally {
      await single.shutdown()
    }
  },
}
