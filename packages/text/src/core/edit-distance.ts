export type EditDistanceOptions<T> = {
  /** Symbol equality. Default: `Object.is` */
  equals?: (x: T, y: T) => boolean
}

/**
 * Minimum number of single-symbol insertions, deletions and substitutions
 * that turn `a` into `b`.
 *
 * Runs in O(m·n) time and keeps two rows of n + 1 counters.
 *
 * @example
 * ```ts
 * editDistance([1, 2, 3], [1, 3]) // 1
 * editDistance(["GET", "/a"], ["get", "/a"], {
 *   equals: (x, y) => x.toLowerCase() === y.toLowerCase(),
 * }) // 0
 * ```
 */
export function editDistance<T>(
  a: readonly T[],
  b: readonly T[],
  options: EditDistanceOptions<T> = {},
): number {
  const equals = options.equals ?? Object.is
  const n = b.length

  if (a.length === 0) return n
  if (n === 0) return a.length

  let prev = Uint32Array.from({ length: n + 1 }, (_, j) => j)
  let cur = new Uint32Array(n + 1)

  for (const [i, x] of a.entries()) {
    cur[0] = i + 1

    for (const [j, y] of b.entries()) {
      const cost = equals(x, y) ? 0 : 1

      cur[j + 1] = Math.min((cur[j] ?? 0) + 1, (prev[j + 1] ?? 0) + 1, (prev[j] ?? 0) + cost)
    }

    ;[prev, cur] = [cur, prev]
  }

  return prev[n] ?? 0
}
