/**
 * Where the result came from
 * - "leader": this caller executed the function
 * - "inflight": this caller joined a call started by another
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T

  isLeader: boolean

  /** Number of other callers that shared this result (excluding the leader) */
  sharedWith: number

  source: FlightSource
}

/**
 * Deduplicates concurrent async work by key.
 *
 * Calls to `run()` with a key whose flight is still running share that
 * flight's outcome: the same value, or the same rejection (shared fate).
 * Keys are compared with SameValueZero, as in `Map`.
 *
 * @example
 * ```ts
 * const flights = new MemorySingleflight<number>()
 *
 * // one fibonacci(90) computation, three callers
 * const [a, b, c] = await Promise.all([
 *   flights.run(90, () => fibonacci(90)),
 *   flights.run(90, () => fibonacci(90)),
 *   flights.run(90, () => fibonacci(90)),
 * ])
 *
 * a.isLeader // true
 * b.source   // "inflight"
 * ```
 */
export interface Singleflight<K = string> {
  /**
   * Execute `fn` for `key` unless a flight for `key` is already running, in
   * which case wait for that one.
   *
   * The flight is dropped once it settles, so the call after a failure
   * starts fresh.
   */
  run<R>(key: K, fn: () => R | Promise<R>): Promise<FlightResult<R>>

  /** Like `run()`, but returns undefined if a flight for `key` is running. */
  tryRun<R>(key: K, fn: () => R | Promise<R>): Promise<FlightResult<R>> | undefined

  /**
   * Detach the running flight for `key`. Its current waiters still settle;
   * the next caller starts a new flight.
   */
  forget(key: K): void

  /** Number of running flights */
  readonly size: number
}
