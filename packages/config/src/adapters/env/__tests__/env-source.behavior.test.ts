import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns every variable when no prefix is set", async () => {
    const env = { WORKER_POOL_SIZE: "4", LOG_LEVEL: "debug" }

    expect(await new EnvSource({ env }).load()).toEqual(env)
  })

  it("keeps only prefixed keys and strips the prefix", async () => {
    const env = {
      STRATA_WORKER_POOL_SIZE: "4",
      STRATA_LOG_LEVEL: "debug",
      HOME: "/home/test",
    }

    const result = await new EnvSource({ env, prefix: "STRATA_" }).load()

    expect(result).toEqual({ WORKER_POOL_SIZE: "4", LOG_LEVEL: "debug" })
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("STRATA_TEST_ONLY_KEY", "from-process")

    const result = await new EnvSource({ prefix: "STRATA_TEST_ONLY_" }).load()

    expect(result).toEqual({ KEY: "from-process" })
    vi.unstubAllEnvs()
  })
})
