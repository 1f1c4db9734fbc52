import { AsyncLocalStorage } from "node:async_hooks"
import { SystemClock, type TimeSource } from "@strata/clock"
import { createNullLogger, type Logger } from "@strata/logger"
import { MemorySingleflight } from "@strata/singleflight"
import { describeKey } from "../../core/describe-key"
import { MemoError } from "../../core/memo-error"
import type { CacheResult } from "../../ports/cache-result"
import type { ComputeFn, MemoizingCache, MemoStats } from "../../ports/memoizing-cache"

export type MemoizingCacheOptions<K> = {
  /**
   * Maps a key to the value used for lookups. Keys are otherwise compared
   * with SameValueZero, so object keys match only by identity.
   *
   * @example
   * ```ts
   * keyOf: ([a, b]) => `${a}\u0000${b}`
   * ```
   */
  keyOf?: (key: K) => unknown
}

export type MemoizingCacheDeps = {
  logger?: Logger
  clock?: TimeSource
}

type Committed<V> = { value: V }

export class MemoryMemoizingCache<K, V> implements MemoizingCache<K, V> {
  private readonly committed = new Map<unknown, Committed<V>>()
  private readonly flights = new MemorySingleflight<unknown>()
  private readonly logger: Logger
  private readonly clock: TimeSource
  private readonly computing = new AsyncLocalStorage<ReadonlySet<unknown>>()
  private readonly counters: MemoStats = { hits: 0, misses: 0, computations: 0, failures: 0 }

  constructor(
    private readonly compute: ComputeFn<K, V>,
    private readonly options: MemoizingCacheOptions<K> = {},
    deps: MemoizingCacheDeps = {},
  ) {
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "memo" })
  }

  async get(key: K): Promise<V> {
    const id = this.idOf(key)
    const entry = this.committed.get(id)

    if (entry) {
      this.counters.hits++
      return entry.value
    }

    const lineage = this.computing.getStore()

    if (lineage?.has(id)) {
      throw MemoError.recursive(describeKey(id))
    }

    this.counters.misses++

    const { value } = await this.flights.run<V>(id, () =>
      this.computing.run(new Set(lineage).add(id), () => this.computeAndCommit(key, id)),
    )

    return value
  }

  peek(key: K): CacheResult<V> {
    const entry = this.committed.get(this.idOf(key))

    return entry ? { kind: "hit", value: entry.value } : { kind: "miss" }
  }

  has(key: K): boolean {
    return this.committed.has(this.idOf(key))
  }

  get size(): number {
    return this.committed.size
  }

  get inFlight(): number {
    return this.flights.size
  }

  stats(): Readonly<MemoStats> {
    return { ...this.counters }
  }

  private idOf(key: K): unknown {
    return this.options.keyOf ? this.options.keyOf(key) : key
  }

  private async computeAndCommit(key: K, id: unknown): Promise<V> {
    const startedAt = this.clock.nowMs()
    this.counters.computations++

    try {
      const value = await this.compute(key)

      this.committed.set(id, { value })
      this.logger.debug("Committed value", {
        key: describeKey(id),
        durationMs: this.clock.nowMs() - startedAt,
      })

      return value
    } catch (err) {
      this.counters.failures++
      this.logger.warn("Computation failed; key left uncommitted", {
        key: describeKey(id),
        err,
      })

      throw err
    }
  }
}

export type Memoized<K, V> = ((key: K) => Promise<V>) & {
  readonly cache: MemoizingCache<K, V>
}

/**
 * Wrap `fn` in a {@link MemoryMemoizingCache} and return its `get`.
 *
 * @example
 * ```ts
 * const fib = memoize((n: number) => fibonacci(n))
 *
 * await Promise.all([fib(30), fib(30)]) // fibonacci(30) runs once
 * fib.cache.size // 1
 * ```
 */
export function memoize<K, V>(
  fn: ComputeFn<K, V>,
  options?: MemoizingCacheOptions<K>,
  deps?: MemoizingCacheDeps,
): Memoized<K, V> {
  const cache = new MemoryMemoizingCache(fn, options, deps)

  return Object.assign((key: K) => cache.get(key), { cache })
}
