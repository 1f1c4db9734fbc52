export { assertNever } from "./core/assert-never"
export { area, circle, describeShape, rectangle } from "./core/shape"
export type { Circle, Rectangle, Shape, ShapeKind } from "./ports/shape"
