import { circle, describeShape, rectangle, type Shape } from "@strata/shapes"
import type { DemoSection } from "../section"

export const shapesSection: DemoSection = {
  name: "shapes",
  run: () => {
    const shapes: Shape[] = [circle(2.5), rectangle(3, 4)]

    return [`Shapes: ${shapes.map(describeShape).join(", ")}`]
  },
}
