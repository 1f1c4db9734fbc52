import { editDistance } from "../edit-distance"
import { levenshtein } from "../levenshtein"

const words = ["", "a", "ab", "abc", "kitten", "sitting", "mitten", "flaw", "lawn", "sunday"]

describe("editDistance", () => {
  it.each([
    ["kitten", "sitting", 3],
    ["flaw", "lawn", 2],
    ["saturday", "sunday", 3],
    ["intention", "execution", 5],
    ["gumbo", "gambol", 2],
    ["abc", "abc", 0],
    ["abc", "", 3],
    ["", "abc", 3],
    ["", "", 0],
  ])("levenshtein(%j, %j) is %i", (a, b, expected) => {
    expect(levenshtein(a, b)).toBe(expected)
  })

  it("works over arbitrary symbols", () => {
    expect(editDistance([1, 2, 3, 4], [1, 3, 4, 5])).toBe(2)
    expect(editDistance([true, false], [false, true])).toBe(2)
  })

  it("returns the other length when one side is empty", () => {
    expect(editDistance([], [1, 2, 3])).toBe(3)
    expect(editDistance(["x", "y"], [])).toBe(2)
    expect(editDistance([], [])).toBe(0)
  })

  it("uses Object.is by default", () => {
    expect(editDistance([Number.NaN], [Number.NaN])).toBe(0)
    expect(editDistance([{ id: 1 }], [{ id: 1 }])).toBe(1)
  })

  it("accepts a custom equality", () => {
    const equals = (x: { id: number }, y: { id: number }) => x.id === y.id

    expect(editDistance([{ id: 1 }, { id: 2 }], [{ id: 1 }, { id: 3 }], { equals })).toBe(1)
  })

  it("is zero exactly for equal inputs", () => {
    for (const a of words) {
      for (const b of words) {
        expect(levenshtein(a, b) === 0).toBe(a === b)
      }
    }
  })

  it("is symmetric", () => {
    for (const a of words) {
      for (const b of words) {
        expect(levenshtein(a, b)).toBe(levenshtein(b, a))
      }
    }
  })

  it("satisfies the triangle inequality", () => {
    for (const a of words) {
      for (const b of words) {
        for (const c of words) {
          expect(levenshtein(a, c)).toBeLessThanOrEqual(levenshtein(a, b) + levenshtein(b, c))
        }
      }
    }
  })

  it("is bounded by the longer length and at least the length difference", () => {
    for (const a of words) {
      for (const b of words) {
        const d = levenshtein(a, b)

        expect(d).toBeLessThanOrEqual(Math.max(a.length, b.length))
        expect(d).toBeGreaterThanOrEqual(Math.abs(a.length - b.length))
      }
    }
  })
})

describe("levenshtein", () => {
  it("counts code points rather than UTF-16 units", () => {
    expect(levenshtein("a\u{1F600}", "a")).toBe(1)
    expect(levenshtein("\u{1F600}\u{1F601}", "\u{1F601}")).toBe(1)
  })

  it("treats null and undefined as empty", () => {
    expect(levenshtein(null, "abc")).toBe(3)
    expect(levenshtein("ab", undefined)).toBe(2)
    expect(levenshtein(null, null)).toBe(0)
  })

  it("is case sensitive", () => {
    expect(levenshtein("Kitten", "kitten")).toBe(1)
  })
})
