/**
 * Upper-cases the first code point of each whitespace-separated word and
 * lower-cases the rest. Words are re-joined with a single space; blank input
 * comes back unchanged.
 */
export function titleCase(input: string): string {
  const trimmed = input.trim()
  if (trimmed === "") return input

  return trimmed.split(/\s+/).map(capitalize).join(" ")
}

function capitalize(word: string): string {
  const [first = "", ...rest] = word

  return first.toUpperCase() + rest.join("").toLowerCase()
}
