import { readTextFile, writeTextFile } from "@strata/files"
import type { DemoSection } from "../section"

export const filesSection: DemoSection = {
  name: "files",
  run: async ({ config }) => {
    await writeTextFile(config.demo.outputFile, "Hello from the Strata utility suite!")

    return [`File content: ${await readTextFile(config.demo.outputFile)}`]
  },
}
