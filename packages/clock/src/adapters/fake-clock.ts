import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * `sleep` never waits: it records the requested duration and moves virtual
 * time forward by it, so code polling on a timer advances deterministically.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly slept: Milliseconds[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  nowMs(): Milliseconds {
    return this.time
  }

  now(): Date {
    return new Date(this.time)
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  /** Durations passed to `sleep`, oldest first. */
  sleeps(): readonly Milliseconds[] {
    return [...this.slept]
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.slept.push(ms)
    this.advance(Math.max(0, ms))
  }
}
