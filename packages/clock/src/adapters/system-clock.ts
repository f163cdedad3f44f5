import { setTimeout as delay } from "node:timers/promises"
import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return Date.now()
  }

  now(): Date {
    return new Date()
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return

    try {
      await delay(ms, undefined, signal ? { signal } : {})
    } catch (err) {
      if (signal?.aborted) return

      throw err
    }
  }
}
