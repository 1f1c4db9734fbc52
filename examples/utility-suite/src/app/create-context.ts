import { type AppConfig, type EnvOverrides, loadAppConfig } from "./config"
import { type CoreServices, createCoreServices } from "./services/core"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  configOverrides?: EnvOverrides
  coreOverrides?: Partial<CoreServices>

  /** Source of randomness for the fallback pipeline. Default: `Math.random` */
  random?: () => number
}

export type AppContext = {
  config: AppConfig
  services: CoreServices
  random: () => number
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.configOverrides)

  const services = { ...createCoreServices(config), ...options.coreOverrides }

  return {
    config,
    services,
    random: options.random ?? Math.random,
  }
}
