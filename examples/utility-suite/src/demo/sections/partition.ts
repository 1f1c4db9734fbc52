import { partitionCount } from "@strata/collections"
import type { DemoSection } from "../section"

export const partitionSection: DemoSection = {
  name: "partition",
  run: () => {
    const counts = partitionCount([1, 2, 3, 4, 5, 6], (n) => n % 2 === 0)
    const entries = [...counts].map(([even, count]) => `${even}=${count}`)

    return [`Partition counts (even/odd): {${entries.join(", ")}}`]
  },
}
