import { type AppContextOptions, createAppContext } from "./app/create-context"
import { runDemo } from "./demo/run-demo"

export type ReportWriter = {
  write(text: string): unknown
}

export type RunOptions = AppContextOptions & {
  /** Where the report goes. Default: `process.stdout` */
  out?: ReportWriter
}

export async function run(options: RunOptions = {}): Promise<void> {
  const ctx = await createAppContext(options)
  const { logger } = ctx.services

  logger.info("Demo started", {
    pool: ctx.config.pool.name,
    poolSize: ctx.config.pool.size,
  })

  const lines = await runDemo(ctx)
  const out = options.out ?? process.stdout

  out.write(`${lines.join("\n")}\n`)

  logger.info("Demo finished", { lines: lines.length })
}
