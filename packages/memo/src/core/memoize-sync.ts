import { describeKey } from "./describe-key"
import { MemoError } from "./memo-error"

/**
 * Synchronous memoizer for synchronous callers.
 *
 * Same rules as the async cache: the first successful result is kept for
 * good, a throw commits nothing. A re-entrant call for the key being
 * computed throws {@link MemoError} (`recursive_computation`).
 */
export function memoizeSync<K, V>(fn: (key: K) => V): (key: K) => V {
  const committed = new Map<K, { value: V }>()
  const computing = new Set<K>()

  return (key: K): V => {
    const entry = committed.get(key)
    if (entry) return entry.value

    if (computing.has(key)) {
      throw MemoError.recursive(describeKey(key))
    }

    computing.add(key)

    try {
      const value = fn(key)
      committed.set(key, { value })
      return value
    } finally {
      computing.delete(key)
    }
  }
}
