import type { CacheResult } from "./cache-result"
import type { ReadThrough } from "./read-through"

/**
 * A named cache of `K` to `V`.
 *
 * @remarks
 * Values live only in the backing store; nothing is kept in process memory.
 * Entries may disappear at any time (expiry, `clear()` from another process),
 * so a miss never implies absence in the source of truth.
 */
export interface Cache<K, V> extends ReadThrough<K, V> {
  name(): string

  get(key: K): Promise<CacheResult<V>>

  /** Overwrites any existing entry. */
  put(key: K, value: V): Promise<void>

  /**
   * Store `value` only when no entry exists for `key`.
   *
   * @returns `miss` when this call stored the value, otherwise `hit` with the
   * entry that was already there.
   */
  putIfAbsent(key: K, value: V): Promise<CacheResult<V>>

  /** Idempotent. */
  evict(key: K): Promise<void>

  /** Removes every entry this cache has indexed. */
  clear(): Promise<void>
}
