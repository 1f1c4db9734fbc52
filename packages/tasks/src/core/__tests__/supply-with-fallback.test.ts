import { type AppError, BaseError } from "@strata/errors"
import { deferred } from "../../tests/utils/deferred"
import { flushPromises } from "../../tests/utils/flush"
import { supplyWithFallback } from "../supply-with-fallback"
import { createWorkerPool } from "../worker-pool"

describe("supplyWithFallback", () => {
  it("maps the supplied value", async () => {
    const fallback = vi.fn((_err: AppError) => -1)

    expect(await supplyWithFallback(() => 21, (n) => n * 2, fallback)).toBe(42)
    expect(fallback).not.toHaveBeenCalled()
  })

  it("hands an AppError from the supplier to the fallback unchanged", async () => {
    const failure = new BaseError("sensor offline", { code: "sensor_offline" })

    const result = await supplyWithFallback(
      (): number => {
        throw failure
      },
      (n) => `Reading: ${n}`,
      (err) => `Recovered from ${err.code}`,
    )

    expect(result).toBe("Recovered from sensor_offline")
  })

  it("wraps a plain mapper error before the fallback sees it", async () => {
    const failure = new Error("bad value")
    let seen: AppError | undefined

    await supplyWithFallback(
      () => 1,
      () => {
        throw failure
      },
      (err) => {
        seen = err
        return 0
      },
    )

    expect(seen).toMatchObject({ code: "unknown", message: "bad value", cause: failure })
  })

  it("rejects when the fallback throws", async () => {
    const fallbackFailure = new Error("fallback failed")

    await expect(
      supplyWithFallback(
        () => Promise.reject(new Error("supplier failed")),
        (n: number) => n,
        () => {
          throw fallbackFailure
        },
      ),
    ).rejects.toBe(fallbackFailure)
  })

  it("runs the supplier on the pool when given", async () => {
    const pool = createWorkerPool({ name: "worker", concurrency: 1 })
    const gate = deferred<void>()
    const supplier = vi.fn(() => 5)

    const blocker = pool.submit(() => gate.promise)
    const result = supplyWithFallback(supplier, (n) => n + 1, () => 0, { pool })

    await flushPromises()
    expect(supplier).not.toHaveBeenCalled()

    gate.resolve()
    await blocker

    expect(await result).toBe(6)
    expect(supplier).toHaveBeenCalledOnce()
  })

  it("falls back when the pool is shut down", async () => {
    const pool = createWorkerPool({ name: "worker", concurrency: 1 })
    await pool.shutdown()

    const result = await supplyWithFallback(
      () => 1,
      (n) => n,
      (err) => (err.code === "pool_shut_down" ? -1 : -2),
      { pool },
    )

    expect(result).toBe(-1)
  })
})
