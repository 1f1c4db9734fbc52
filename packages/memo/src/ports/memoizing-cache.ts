import type { CacheResult } from "./cache-result"

/**
 * The function being memoized. It must be pure and deterministic: the same
 * key always yields the same value, with no side effects.
 */
export type ComputeFn<K, V> = (key: K) => V | Promise<V>

export type MemoStats = {
  /** `get()` calls answered from a committed value */
  hits: number

  /** `get()` calls that started or joined a computation */
  misses: number

  /** Invocations of the compute function */
  computations: number

  /** Computations that threw or rejected */
  failures: number
}

/**
 * Unbounded cache that computes each key's value at most once.
 *
 * @remarks
 * - Concurrent `get()` calls for an uncommitted key share one computation
 *   and observe the same value.
 * - A failed computation is not committed; every caller waiting on it
 *   receives the original error, and the next `get()` computes again.
 * - Entries are never evicted.
 */
export interface MemoizingCache<K, V> {
  get(key: K): Promise<V>

  /** Committed value for `key`, without computing. */
  peek(key: K): CacheResult<V>

  has(key: K): boolean

  /** Number of committed entries */
  readonly size: number

  /** Number of computations currently running */
  readonly inFlight: number

  stats(): Readonly<MemoStats>
}
