import type { Circle, Rectangle, Shape } from "../ports/shape"
import { assertNever } from "./assert-never"

export function circle(radius: number): Circle {
  assertDimension("radius", radius)

  return { kind: "circle", radius }
}

export function rectangle(width: number, height: number): Rectangle {
  assertDimension("width", width)
  assertDimension("height", height)

  return { kind: "rectangle", width, height }
}

/**
 * @example
 * ```ts
 * describeShape(circle(2.5))      // "Circle(radius=2.5)"
 * describeShape(rectangle(3, 4))  // "Rectangle(3x4)"
 * ```
 */
export function describeShape(shape: Shape): string {
  switch (shape.kind) {
    case "circle":
      return `Circle(radius=${shape.radius})`
    case "rectangle":
      return `Rectangle(${shape.width}x${shape.height})`
    default:
      return assertNever(shape)
  }
}

export function area(shape: Shape): number {
  switch (shape.kind) {
    case "circle":
      return Math.PI * shape.radius ** 2
    case "rectangle":
      return shape.width * shape.height
    default:
      return assertNever(shape)
  }
}

function assertDimension(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a finite number >= 0 (got ${value})`)
  }
}
