import { editDistance } from "./edit-distance"

/**
 * Edit distance between two strings, counted in Unicode code points.
 * `null` and `undefined` count as the empty string.
 *
 * @example
 * ```ts
 * levenshtein("kitten", "sitting") // 3
 * ```
 */
export function levenshtein(a: string | null | undefined, b: string | null | undefined): number {
  return editDistance(Array.from(a ?? ""), Array.from(b ?? ""))
}
