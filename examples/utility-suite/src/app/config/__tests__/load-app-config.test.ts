import { ConfigError } from "@strata/config"
import { loadAppConfig } from "../load-app-config"

describe("loadAppConfig", () => {
  it("fills every value from defaults", async () => {
    expect(await loadAppConfig({})).toEqual({
      app: { env: "development", serviceName: "Utility Suite" },
      logging: { level: "info", prettify: false },
      pool: { name: "worker", size: 4 },
      demo: {
        batchTimeoutMs: 5_000,
        fibInputs: [30, 31, 32],
        outputFile: "./demo-output.txt",
      },
    })
  })

  it("coerces values read from the environment", async () => {
    const config = await loadAppConfig({
      LOG_LEVEL: "debug",
      LOG_PRETTY: "true",
      WORKER_POOL_SIZE: "8",
      BATCH_TIMEOUT_MS: "250",
      FIB_INPUTS: " 5, 6 ,7",
    })

    expect(config.logging).toEqual({ level: "debug", prettify: true })
    expect(config.pool.size).toBe(8)
    expect(config.demo.batchTimeoutMs).toBe(250)
    expect(config.demo.fibInputs).toEqual([5, 6, 7])
  })

  it("applies overrides after the environment", async () => {
    const config = await loadAppConfig(
      { WORKER_POOL_NAME: "from-env", APP_ENV: "test" },
      { WORKER_POOL_NAME: "from-override" },
    )

    expect(config.pool.name).toBe("from-override")
    expect(config.app.env).toBe("test")
  })

  it("rejects a pool size below one", async () => {
    const loading = loadAppConfig({ WORKER_POOL_SIZE: "0" })

    await expect(loading).rejects.toBeInstanceOf(ConfigError)
    await expect(loading).rejects.toMatchObject({
      code: "config_invalid",
      context: { issues: [expect.objectContaining({ path: "WORKER_POOL_SIZE" })] },
    })
  })

  it("rejects a malformed Fibonacci input list", async () => {
    await expect(loadAppConfig({ FIB_INPUTS: "1,x" })).rejects.toMatchObject({
      context: {
        issues: [
          {
            path: "FIB_INPUTS",
            message: "Expected a comma-separated list of non-negative integers",
          },
        ],
      },
    })
  })

  it("rejects an unknown log level", async () => {
    await expect(loadAppConfig({ LOG_LEVEL: "loud" })).rejects.toMatchObject({
      code: "config_invalid",
      context: { issues: [expect.objectContaining({ path: "LOG_LEVEL" })] },
    })
  })
})
