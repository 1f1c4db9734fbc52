import type { Milliseconds } from "@strata/clock"
import { type LogLevelName, logLevelNames } from "@strata/logger"
import { z } from "zod"

const fibInputs = z.string().transform((raw, ctx) => {
  const values = raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map(Number)

  if (values.some((n) => !Number.isInteger(n) || n < 0)) {
    ctx.addIssue({
      code: "custom",
      message: "Expected a comma-separated list of non-negative integers",
    })
    return z.NEVER
  }

  return values
})

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("Utility Suite"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  WORKER_POOL_NAME: z.string().min(1).default("worker"),
  WORKER_POOL_SIZE: z.coerce.number().int().min(1).default(4),

  BATCH_TIMEOUT_MS: z.coerce.number().nonnegative().default(5_000),
  FIB_INPUTS: fibInputs.default([30, 31, 32]),
  DEMO_OUTPUT_FILE: z.string().min(1).default("./demo-output.txt"),
})

export type EnvConfig = z.infer<typeof envSchema>

/** Raw values accepted as overrides, before coercion */
export type EnvOverrides = Partial<z.input<typeof envSchema>>

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  pool: {
    name: string
    size: number
  }

  demo: {
    batchTimeoutMs: Milliseconds
    fibInputs: number[]
    outputFile: string
  }
}
