import type { Shape } from "../../ports/shape"
import { area, circle, describeShape, rectangle } from "../shape"

describe("shapes", () => {
  it("describes each kind", () => {
    expect(describeShape(circle(2.5))).toBe("Circle(radius=2.5)")
    expect(describeShape(rectangle(3, 4))).toBe("Rectangle(3x4)")
  })

  it("computes area", () => {
    expect(area(rectangle(3, 4))).toBe(12)
    expect(area(circle(2))).toBeCloseTo(12.566370614359172)
    expect(area(circle(0))).toBe(0)
  })

  it("builds plain tagged values", () => {
    const shapes: Shape[] = [circle(1), rectangle(2, 5)]

    expect(shapes).toEqual([
      { kind: "circle", radius: 1 },
      { kind: "rectangle", width: 2, height: 5 },
    ])
  })

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])("rejects radius %s", (radius) => {
    expect(() => circle(radius)).toThrow(RangeError)
  })

  it("rejects a negative rectangle side", () => {
    expect(() => rectangle(3, -4)).toThrow("height must be a finite number >= 0 (got -4)")
  })
})
