import type { Milliseconds, Seconds } from "@keystash/clock"
import type { CacheOptions } from "../ports/cache-options"
import { CacheConfigError } from "./cache-errors"

export const DEFAULT_LOCK_POLL_MS: Milliseconds = 300
export const DEFAULT_PAGE_SIZE = 128

export type ResolvedCacheOptions = {
  name: string
  prefix: Uint8Array
  expirationSeconds: Seconds
  lockPollMs: Milliseconds
  pageSize: number
}

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw CacheConfigError.invalid(field, "must be a positive integer", value)
  }
}

export function resolveCacheOptions(opts: CacheOptions): ResolvedCacheOptions {
  if (opts.name.trim().length === 0) {
    throw CacheConfigError.invalid("name", "must not be blank", opts.name)
  }

  const expirationSeconds = opts.expirationSeconds ?? 0
  if (!Number.isSafeInteger(expirationSeconds) || expirationSeconds < 0) {
    throw CacheConfigError.invalid(
      "expirationSeconds",
      "must be a non-negative integer",
      expirationSeconds,
    )
  }

  const lockPollMs = opts.lockPollMs ?? DEFAULT_LOCK_POLL_MS
  assertPositiveInteger(lockPollMs, "lockPollMs")

  const pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE
  assertPositiveInteger(pageSize, "pageSize")

  return {
    name: opts.name,
    prefix: opts.prefix ?? new Uint8Array(0),
    expirationSeconds,
    lockPollMs,
    pageSize,
  }
}
