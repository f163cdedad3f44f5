import type { Seconds } from "@keystash/clock"
import type { CacheStore, CacheStoreTransaction } from "../ports/cache-store"

export type KeyIndexDeps = {
  store: CacheStore
}

export type KeyIndexOptions = {
  indexKey: Uint8Array
  pageSize: number
}

const MEMBER_SCORE = 0

/**
 * Sorted set at `indexKey` listing every physical key the cache wrote.
 *
 * @remarks
 * All members share one score, so the set orders them by their bytes.
 */
export class KeyIndex {
  constructor(
    private readonly deps: KeyIndexDeps,
    private readonly opts: KeyIndexOptions,
  ) {}

  async record(physicalKey: Uint8Array): Promise<void> {
    await this.deps.store.zAdd(this.opts.indexKey, MEMBER_SCORE, physicalKey)
  }

  async forget(physicalKey: Uint8Array): Promise<void> {
    await this.deps.store.zRem(this.opts.indexKey, [physicalKey])
  }

  recordIn(tx: CacheStoreTransaction, physicalKey: Uint8Array): void {
    tx.zAdd(this.opts.indexKey, MEMBER_SCORE, physicalKey)
  }

  forgetIn(tx: CacheStoreTransaction, physicalKey: Uint8Array): void {
    tx.zRem(this.opts.indexKey, [physicalKey])
  }

  expireIn(tx: CacheStoreTransaction, seconds: Seconds): void {
    tx.expire(this.opts.indexKey, seconds)
  }

  /**
   * Delete every indexed key page by page, then the index itself.
   *
   * @remarks
   * Members stay in the set until the final delete, so page ranks do not
   * shift while draining. Keys added concurrently may or may not be seen.
   *
   * @returns number of index members visited.
   */
  async drainAll(): Promise<number> {
    const { indexKey, pageSize } = this.opts
    let drained = 0

    for (let page = 0; ; page++) {
      const start = page * pageSize
      const keys = await this.deps.store.zRange(indexKey, start, start + pageSize - 1)

      if (keys.length > 0) {
        await this.deps.store.del(keys)
        drained += keys.length
      }

      if (keys.length < pageSize) break
    }

    await this.deps.store.del([indexKey])

    return drained
  }
}
