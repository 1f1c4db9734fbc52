/**
 * Split `items` by `predicate`. The map always holds `false` and then `true`,
 * each with the matching items in their original order.
 *
 * @example
 * ```ts
 * partition([1, 2, 3, 4], (n) => n % 2 === 0)
 * // Map { false => [1, 3], true => [2, 4] }
 * ```
 */
export function partition<T>(
  items: Iterable<T>,
  predicate: (item: T) => boolean,
): ReadonlyMap<boolean, T[]> {
  const matched: T[] = []
  const rest: T[] = []

  for (const item of items) {
    if (predicate(item)) {
      matched.push(item)
    } else {
      rest.push(item)
    }
  }

  return new Map([
    [false, rest],
    [true, matched],
  ])
}

/** Like {@link partition}, counting instead of collecting. */
export function partitionCount<T>(
  items: Iterable<T>,
  predicate: (item: T) => boolean,
): ReadonlyMap<boolean, number> {
  let matched = 0
  let rest = 0

  for (const item of items) {
    if (predicate(item)) {
      matched++
    } else {
      rest++
    }
  }

  return new Map([
    [false, rest],
    [true, matched],
  ])
}
