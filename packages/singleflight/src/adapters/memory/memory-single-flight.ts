import type { FlightResult, Singleflight } from "../../ports/single-flight"

interface InFlight {
  promise: Promise<unknown>
  followerCount: number
}

export class MemorySingleflight<K = string> implements Singleflight<K> {
  private readonly flights = new Map<K, InFlight>()

  async run<R>(key: K, fn: () => R | Promise<R>): Promise<FlightResult<R>> {
    const existing = this.flights.get(key)

    if (existing) {
      existing.followerCount++
      // The leader stored this promise from its own fn, so it resolves to R.
      const value = (await existing.promise) as R

      return {
        value,
        isLeader: false,
        sharedWith: existing.followerCount,
        source: "inflight",
      }
    }

    const promise = invoke(fn)
    const flight: InFlight = { promise, followerCount: 0 }

    this.flights.set(key, flight)

    try {
      const value = await promise
      return {
        value,
        isLeader: true,
        sharedWith: flight.followerCount,
        source: "leader",
      }
    } finally {
      if (this.flights.get(key) === flight) {
        this.flights.delete(key)
      }
    }
  }

  tryRun<R>(key: K, fn: () => R | Promise<R>): Promise<FlightResult<R>> | undefined {
    if (this.flights.has(key)) return undefined

    return this.run(key, fn)
  }

  forget(key: K): void {
    this.flights.delete(key)
  }

  get size(): number {
    return this.flights.size
  }
}

async function invoke<R>(fn: () => R | Promise<R>): Promise<R> {
  return fn()
}
