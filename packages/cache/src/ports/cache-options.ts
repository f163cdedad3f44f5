import type { Milliseconds, Seconds } from "@keystash/clock"

export type CacheOptions = {
  /** Non-empty. Also names the index (`<name>~keys`) and lock (`<name>~lock`) keys. */
  name: string

  /**
   * Bytes prepended to every serialized key, isolating caches that share a
   * store. Not applied to the index and lock keys.
   */
  prefix?: Uint8Array

  /**
   * Expiry applied to every value written, and to the index.
   * `0` disables expiration.
   *
   * @default 0
   */
  expirationSeconds?: Seconds

  /**
   * Interval between checks while a `clear()` holds the lock.
   *
   * @default 300
   */
  lockPollMs?: Milliseconds

  /**
   * Number of indexed keys fetched and deleted per round by `clear()`.
   *
   * @default 128
   */
  pageSize?: number
}
