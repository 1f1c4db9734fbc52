import type { TimeSource } from "@strata/clock"
import { MemoryLogger } from "@strata/logger"
import { mock } from "vitest-mock-extended"
import { MemoError } from "../../../core/memo-error"
import { deferred } from "../../../tests/utils/deferred"
import { type Memoized, MemoryMemoizingCache, memoize } from "../memory-memoizing-cache"

describe("MemoryMemoizingCache behavior", () => {
  describe("stats", () => {
    it("counts hits, misses, computations and failures", async () => {
      let calls = 0
      const cache = new MemoryMemoizingCache(async (n: number) => {
        calls++
        if (calls === 1) throw new Error("first attempt")
        return n + 1
      })

      await expect(cache.get(1)).rejects.toThrow("first attempt")
      await Promise.all([cache.get(1), cache.get(1)])
      await cache.get(1)

      expect(cache.stats()).toEqual({ hits: 1, misses: 3, computations: 2, failures: 1 })
    })

    it("returns a snapshot", async () => {
      const cache = new MemoryMemoizingCache((n: number) => n)
      const before = cache.stats()

      await cache.get(1)

      expect(before.misses).toBe(0)
      expect(cache.stats().misses).toBe(1)
    })
  })

  describe("keyOf", () => {
    it("matches structurally equal keys through the derived id", async () => {
      let calls = 0
      const cache = new MemoryMemoizingCache(
        ([a, b]: readonly [string, string]) => {
          calls++
          return `${a}:${b}`
        },
        { keyOf: ([a, b]) => `${a}\u0000${b}` },
      )

      await cache.get(["kitten", "sitting"])
      await cache.get(["kitten", "sitting"])

      expect(calls).toBe(1)
      expect(cache.has(["kitten", "sitting"])).toBe(true)
      expect(cache.peek(["sitting", "kitten"])).toEqual({ kind: "miss" })
    })

    it("compares object keys by identity without keyOf", async () => {
      let calls = 0
      const cache = new MemoryMemoizingCache((key: { n: number }) => {
        calls++
        return key.n
      })

      const key = { n: 1 }
      await cache.get(key)
      await cache.get(key)
      await cache.get({ n: 1 })

      expect(calls).toBe(2)
    })
  })

  describe("recursion", () => {
    it("rejects a computation that asks for its own key", async () => {
      const cache: MemoryMemoizingCache<number, number> = new MemoryMemoizingCache(
        (n: number) => cache.get(n),
      )

      const result = cache.get(5)

      await expect(result).rejects.toBeInstanceOf(MemoError)
      await expect(result).rejects.toMatchObject({
        code: "recursive_computation",
        context: { key: "5" },
      })
      expect(cache.size).toBe(0)
      expect(cache.inFlight).toBe(0)
    })

    it("rejects a cycle that runs through other keys", async () => {
      const cache: MemoryMemoizingCache<string, string> = new MemoryMemoizingCache(
        (key: string) => cache.get(key === "a" ? "b" : "a"),
      )

      await expect(cache.get("a")).rejects.toMatchObject({
        code: "recursive_computation",
        context: { key: "a" },
      })
      expect(cache.stats().failures).toBe(2)
    })

    it("does not treat concurrent callers of the same key as recursion", async () => {
      const gate = deferred<string>()
      const cache = new MemoryMemoizingCache((_key: string) => gate.promise)

      const a = cache.get("k")
      const b = cache.get("k")
      gate.resolve("v")

      expect(await Promise.all([a, b])).toEqual(["v", "v"])
    })
  })

  describe("logging", () => {
    it("logs each commit with its duration", async () => {
      const logger = new MemoryLogger()
      const clock = mock<TimeSource>()
      clock.nowMs.mockReturnValueOnce(1_000).mockReturnValueOnce(1_025)

      const cache = new MemoryMemoizingCache((n: number) => n * n, {}, { logger, clock })

      await cache.get(7)
      await cache.get(7)

      expect(logger.entries).toEqual([
        {
          level: "debug",
          message: "Committed value",
          fields: { module: "memo", key: "7", durationMs: 25 },
        },
      ])
    })

    it("logs a failed computation at warn with the error", async () => {
      const logger = new MemoryLogger()
      const failure = new Error("boom")
      const cache = new MemoryMemoizingCache(
        (_key: string): string => {
          throw failure
        },
        {},
        { logger },
      )

      await expect(cache.get("k")).rejects.toBe(failure)

      expect(logger.entries).toEqual([
        {
          level: "warn",
          message: "Computation failed; key left uncommitted",
          fields: { module: "memo", key: "k", err: failure },
        },
      ])
    })
  })

  it("keeps concurrent computations of separate caches apart", async () => {
    const double = new MemoryMemoizingCache(async (n: number) => n * 2)
    const square = new MemoryMemoizingCache(async (n: number) => n * n)

    const [d, s] = await Promise.all([double.get(5), square.get(5)])

    expect({ d, s }).toEqual({ d: 10, s: 25 })
    expect(double.peek(5)).toEqual({ kind: "hit", value: 10 })
    expect(square.peek(5)).toEqual({ kind: "hit", value: 25 })
  })
})

describe("memoize", () => {
  it("returns a function backed by a cache", async () => {
    let calls = 0
    const square = memoize((n: number) => {
      calls++
      return n * n
    })

    expect(await Promise.all([square(12), square(12)])).toEqual([144, 144])
    expect(calls).toBe(1)
    expect(square.cache.size).toBe(1)
  })

  it("supports recursive definitions", async () => {
    const fib: Memoized<number, bigint> = memoize(async (n: number): Promise<bigint> =>
      n < 2 ? BigInt(n) : (await fib(n - 1)) + (await fib(n - 2)),
    )

    expect(await fib(90)).toBe(2880067194370816120n)
    expect(fib.cache.size).toBe(91)
  })
})
