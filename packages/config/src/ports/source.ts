/**
 * Loads raw configuration values. Validation, coercion and merging happen in
 * `loadConfig`; sources applied later override earlier ones.
 */
export interface ConfigSource {
  /** Provenance name, e.g. "env" */
  readonly name: string

  /**
   * Returns a fresh object on every call. An `undefined` value means the key
   * was not provided.
   */
  load(): Promise<Record<string, unknown>>
}
