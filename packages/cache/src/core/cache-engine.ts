import type { Clock, Seconds } from "@keystash/clock"
import { createNullLogger, type Logger } from "@keystash/logger"
import type { Cache } from "../ports/cache"
import type { CacheOptions } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { CacheStore } from "../ports/cache-store"
import type { Serializer } from "../ports/serializer"
import { utf8Bytes } from "./bytes"
import { ValueRetrievalError } from "./cache-errors"
import { resolveCacheOptions } from "./cache-options"
import { KeyCodec } from "./key-codec"
import { KeyIndex } from "./key-index"
import { LockCoordinator } from "./lock-coordinator"
import { ValueCodec } from "./value-codec"

export type CacheEngineDeps<K, V> = {
  store: CacheStore
  clock: Clock
  valueSerializer: Serializer<V>

  /** When absent, keys must already be `Uint8Array`s and are used as-is. */
  keySerializer?: Serializer<K> | undefined

  logger?: Logger | undefined
}

/**
 * A `Cache` stored entirely in a `CacheStore`.
 *
 * @remarks
 * Each cache keeps two bookkeeping keys beside its entries:
 * - `<name>~keys`: sorted set of every physical key written, used by `clear()`
 * - `<name>~lock`: marker present while a `clear()` runs
 *
 * `get`, `put` and `putIfAbsent` wait for the marker to disappear before
 * touching the store. The wait is advisory: a clear starting right after the
 * check is not noticed. `evict` never waits.
 */
export class CacheEngine<K, V> implements Cache<K, V> {
  private readonly cacheName: string
  private readonly expirationSeconds: Seconds
  private readonly keys: KeyCodec<K>
  private readonly values: ValueCodec<V>
  private readonly index: KeyIndex
  private readonly lock: LockCoordinator
  private readonly logger: Logger

  constructor(
    private readonly deps: CacheEngineDeps<K, V>,
    opts: CacheOptions,
  ) {
    const resolved = resolveCacheOptions(opts)

    this.cacheName = resolved.name
    this.expirationSeconds = resolved.expirationSeconds
    this.keys = new KeyCodec(deps.keySerializer, resolved.prefix)
    this.values = new ValueCodec(deps.valueSerializer)
    this.index = new KeyIndex(
      { store: deps.store },
      { indexKey: utf8Bytes(`${resolved.name}~keys`), pageSize: resolved.pageSize },
    )
    this.lock = new LockCoordinator(
      { store: deps.store, clock: deps.clock },
      { lockKey: utf8Bytes(`${resolved.name}~lock`), pollMs: resolved.lockPollMs },
    )
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "cache",
      cache: resolved.name,
    })
  }

  name(): string {
    return this.cacheName
  }

  nativeStore(): CacheStore {
    return this.deps.store
  }

  async get(key: K): Promise<CacheResult<V>> {
    const physicalKey = this.keys.computeKey(key)

    await this.awaitUnlocked("get")

    const bytes = await this.deps.store.get(physicalKey)
    if (bytes === null) return { kind: "miss" }

    return { kind: "hit", value: this.values.decode(bytes) }
  }

  async put(key: K, value: V): Promise<void> {
    const physicalKey = this.keys.computeKey(key)
    const bytes = this.values.encode(value)

    await this.awaitUnlocked("put")

    const tx = this.deps.store.multi()
    tx.set(physicalKey, bytes)
    this.index.recordIn(tx, physicalKey)

    if (this.expirationSeconds > 0) {
      tx.expire(physicalKey, this.expirationSeconds)
      this.index.expireIn(tx, this.expirationSeconds)
    }

    await tx.exec()
  }

  async putIfAbsent(key: K, value: V): Promise<CacheResult<V>> {
    const physicalKey = this.keys.computeKey(key)
    const bytes = this.values.encode(value)

    await this.awaitUnlocked("putIfAbsent")

    const tx = this.deps.store.multi()
    tx.setIfAbsent(physicalKey, bytes, this.expirationSeconds)
    this.index.recordIn(tx, physicalKey)
    if (this.expirationSeconds > 0) this.index.expireIn(tx, this.expirationSeconds)

    // Recording a key the index already holds is a no-op.
    const [written] = await tx.exec()
    if (written === true) return { kind: "miss" }

    const existing = await this.deps.store.get(physicalKey)
    if (existing === null) return { kind: "miss" }

    return { kind: "hit", value: this.values.decode(existing) }
  }

  async getThrough(key: K, loader: () => Promise<V>): Promise<V> {
    const cached = await this.get(key)
    if (cached.kind === "hit") return cached.value

    let value: V
    try {
      value = await loader()
    } catch (err) {
      throw ValueRetrievalError.loaderFailed(this.cacheName, err)
    }

    await this.put(key, value)

    return value
  }

  async evict(key: K): Promise<void> {
    const physicalKey = this.keys.computeKey(key)

    const tx = this.deps.store.multi()
    tx.del([physicalKey])
    this.index.forgetIn(tx, physicalKey)
    await tx.exec()
  }

  /**
   * Remove every indexed entry.
   *
   * @remarks
   * Returns without doing anything when another clear holds the marker.
   * A failed drain leaves part of the entries deleted; the marker is still
   * released, so a later `clear()` finishes the job.
   */
  async clear(): Promise<void> {
    const drained = await this.lock.withExclusive(async () => {
      try {
        return await this.index.drainAll()
      } catch (err) {
        this.logger.warn("Cache clear failed", { operation: "clear", err })
        throw err
      }
    })

    if (drained === null) {
      this.logger.debug("Cache clear skipped, another clear is running", {
        operation: "clear",
      })
      return
    }

    this.logger.info("Cache cleared", { operation: "clear", drained })
  }

  private async awaitUnlocked(operation: string): Promise<void> {
    const waited = await this.lock.awaitUnlocked()

    if (waited) {
      this.logger.debug("Waited for a running clear", { operation })
    }
  }
}
