import { levenshtein, titleCase } from "@strata/text"
import type { DemoSection } from "../section"

export const textSection: DemoSection = {
  name: "text",
  run: () => [
    `Title case: ${titleCase("strata UTILITY suite demo")}`,
    `Levenshtein('kitten','sitting') = ${levenshtein("kitten", "sitting")}`,
  ],
}
