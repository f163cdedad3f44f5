import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): Milliseconds

  now(): Date
}

export interface Sleeper {
  /**
   * Suspend the calling task for `ms` milliseconds.
   *
   * @remarks
   * Resolves (never rejects) as soon as `signal` aborts.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
