import { createConsoleLogger } from "@strata/logger"
import { run } from "./run"

run().catch((err: unknown) => {
  createConsoleLogger({}, { level: "error" }).fatal("Demo failed", { err })
  process.exitCode = 1
})
