/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ WORKER_POOL_SIZE: z.coerce.number().default(4) }),
 *   sources: [new EnvSource({ prefix: "STRATA_" })],
 * })
 *
 * config.value.WORKER_POOL_SIZE   // 4
 * config.explain("WORKER_POOL_SIZE") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object (frozen) */
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed a value, in application order. */
  sourcesUsed(): string[]

  /** Keys provided by sources that the schema does not know. */
  unknownKeys(): string[]
}
