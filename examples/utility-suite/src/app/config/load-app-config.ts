import { type ConfigSource, EnvSource, loadConfig, ObjectSource } from "@strata/config"
import { type AppConfig, type EnvConfig, type EnvOverrides, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    pool: {
      name: env.WORKER_POOL_NAME,
      size: env.WORKER_POOL_SIZE,
    },
    demo: {
      batchTimeoutMs: env.BATCH_TIMEOUT_MS,
      fibInputs: env.FIB_INPUTS,
      outputFile: env.DEMO_OUTPUT_FILE,
    },
  }
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: EnvOverrides,
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new EnvSource({ env }),
    ...(overrides ? [new ObjectSource(overrides)] : []),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
