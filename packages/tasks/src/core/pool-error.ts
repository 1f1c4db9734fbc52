import { BaseError } from "@strata/errors"

export type PoolErrorCode = "pool_shut_down"

export class PoolError extends BaseError<PoolErrorCode> {
  static shutDown(pool: string): PoolError {
    return new PoolError("Worker pool is shut down", {
      code: "pool_shut_down",
      context: { pool },
      isRetryable: false,
    })
  }
}
