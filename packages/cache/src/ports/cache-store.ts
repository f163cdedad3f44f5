import type { Seconds } from "@keystash/clock"

/**
 * Reply of one queued command, with the same meaning as the matching
 * `CacheStore` method's result (`true` for a plain `set`).
 */
export type TransactionReply = boolean | number

/**
 * Commands queued inside a store transaction.
 *
 * @remarks
 * Nothing is sent or applied before `exec()`; `exec()` applies every queued
 * command or none of them, and resolves with one reply per command in queue
 * order. A transaction is spent once `exec()` was called.
 */
export interface CacheStoreTransaction {
  set(key: Uint8Array, value: Uint8Array): void
  /** Replies `true` when the key was created. */
  setIfAbsent(key: Uint8Array, value: Uint8Array, expirationSeconds?: Seconds): void
  del(keys: readonly Uint8Array[]): void
  expire(key: Uint8Array, seconds: Seconds): void
  zAdd(setKey: Uint8Array, score: number, member: Uint8Array): void
  zRem(setKey: Uint8Array, members: readonly Uint8Array[]): void
  exec(): Promise<TransactionReply[]>
}

/**
 * The primitive key-value operations the cache is built from.
 *
 * @remarks
 * Keys and values are opaque bytes. Implementations raise `TransportError`
 * for every failure of the store itself, and must be safe to share between
 * concurrent callers.
 */
export interface CacheStore {
  /** `null` when the key does not exist. */
  get(key: Uint8Array): Promise<Uint8Array | null>

  /** Overwrites the value and drops any expiry. */
  set(key: Uint8Array, value: Uint8Array): Promise<void>

  /**
   * Atomically create `key` only if it does not exist, optionally with an
   * expiry (`0` = none).
   *
   * @returns `true` when this call created the key.
   */
  setIfAbsent(key: Uint8Array, value: Uint8Array, expirationSeconds?: Seconds): Promise<boolean>

  /** @returns number of keys that existed and were removed. */
  del(keys: readonly Uint8Array[]): Promise<number>

  exists(key: Uint8Array): Promise<boolean>

  /** @returns `false` when the key does not exist. */
  expire(key: Uint8Array, seconds: Seconds): Promise<boolean>

  /** @returns `true` when `member` was not in the set before. */
  zAdd(setKey: Uint8Array, score: number, member: Uint8Array): Promise<boolean>

  /**
   * Members ranked `start..stop` (inclusive, negative counts from the end),
   * ordered by score, then by member bytes.
   */
  zRange(setKey: Uint8Array, start: number, stop: number): Promise<Uint8Array[]>

  /** @returns number of members removed. */
  zRem(setKey: Uint8Array, members: readonly Uint8Array[]): Promise<number>

  multi(): CacheStoreTransaction
}
