import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingSleep = {
  wakeAt: UnixMs
  wake: () => void
}

/**
 * Manually driven clock. Sleeps stay pending until `advance()` or `set()`
 * moves time to or past their deadline, or their signal aborts.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private readonly sleeping = new Set<PendingSleep>()

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: UnixMs): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleeps still waiting for time to move. */
  get pendingSleeps(): number {
    return this.sleeping.size
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAt: this.time + ms,
        wake: () => {
          this.sleeping.delete(entry)
          signal?.removeEventListener("abort", entry.wake)
          resolve()
        },
      }

      this.sleeping.add(entry)
      signal?.addEventListener("abort", entry.wake, { once: true })
    })
  }

  private wakeDue(): void {
    const due = [...this.sleeping]
      .filter((s) => s.wakeAt <= this.time)
      .sort((a, b) => a.wakeAt - b.wakeAt)

    for (const sleeper of due) sleeper.wake()
  }
}
