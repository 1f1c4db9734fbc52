import { type AppError, toAppError } from "@strata/errors"
import type { WorkerPool } from "../ports/worker-pool"

export type SupplyWithFallbackOptions = {
  /** Run the supplier on this pool instead of the caller's turn. */
  pool?: WorkerPool
}

/**
 * `mapper(await supplier())`, or `fallback(error)` if either step fails.
 * A throwing fallback rejects the returned promise.
 *
 * @example
 * ```ts
 * const label = await supplyWithFallback(
 *   () => readSensor(),
 *   (reading) => `Reading: ${reading}`,
 *   (err) => `Recovered from ${err.code}`,
 * )
 * ```
 */
export async function supplyWithFallback<S, R>(
  supplier: () => S | Promise<S>,
  mapper: (value: S) => R | Promise<R>,
  fallback: (error: AppError) => R | Promise<R>,
  options: SupplyWithFallbackOptions = {},
): Promise<R> {
  try {
    const supplied = options.pool ? await options.pool.submit(() => supplier()) : await supplier()

    return await mapper(supplied)
  } catch (err) {
    return fallback(toAppError(err))
  }
}
