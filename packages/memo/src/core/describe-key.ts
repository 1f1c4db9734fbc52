/** Loggable form of a cache key. */
export function describeKey(key: unknown): string {
  switch (typeof key) {
    case "string":
      return key
    case "number":
    case "bigint":
    case "boolean":
    case "symbol":
    case "undefined":
      return String(key)
    default:
      return key === null ? "null" : `[${typeof key}]`
  }
}
