import type { AppContext } from "../app/create-context"
import type { DemoSection } from "./section"
import { annotationsSection } from "./sections/annotations"
import { fibonacciSection } from "./sections/fibonacci"
import { filesSection } from "./sections/files"
import { partitionSection } from "./sections/partition"
import { pipelineSection } from "./sections/pipeline"
import { registrySection } from "./sections/registry"
import { shapesSection } from "./sections/shapes"
import { textSection } from "./sections/text"

export const demoSections: readonly DemoSection[] = [
  textSection,
  registrySection,
  fibonacciSection,
  pipelineSection,
  filesSection,
  partitionSection,
  annotationsSection,
  shapesSection,
]

/** Run every section in order and return the full report. */
export async function runDemo(
  ctx: AppContext,
  sections: readonly DemoSection[] = demoSections,
): Promise<string[]> {
  const logger = ctx.services.logger.child({ module: "demo" })
  const lines = ["=== Strata Utility Suite Demo ===", ""]

  for (const section of sections) {
    const startedAt = ctx.services.clock.nowMs()

    lines.push(...(await section.run(ctx)))

    logger.debug("Section finished", {
      operation: `demo.${section.name}`,
      durationMs: ctx.services.clock.nowMs() - startedAt,
    })
  }

  lines.push("", "=== Demo Complete ===")

  return lines
}
