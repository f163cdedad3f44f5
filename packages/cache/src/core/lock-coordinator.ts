import type { Clock, Milliseconds } from "@keystash/clock"
import type { CacheStore } from "../ports/cache-store"

export type LockCoordinatorDeps = {
  store: CacheStore
  clock: Clock
}

export type LockCoordinatorOptions = {
  lockKey: Uint8Array
  pollMs: Milliseconds
}

/**
 * Marker key that gives `clear()` exclusive use of a cache.
 *
 * @remarks
 * The marker carries no owner and no expiry. Readers and writers only wait
 * for it to go away; they never take it.
 */
export class LockCoordinator {
  constructor(
    private readonly deps: LockCoordinatorDeps,
    private readonly opts: LockCoordinatorOptions,
  ) {}

  async isLocked(): Promise<boolean> {
    return await this.deps.store.exists(this.opts.lockKey)
  }

  /**
   * Poll until the marker is absent. Unbounded.
   *
   * @returns `true` when the marker was seen at least once.
   */
  async awaitUnlocked(): Promise<boolean> {
    let sawLock = false

    while (await this.isLocked()) {
      sawLock = true
      await this.deps.clock.sleep(this.opts.pollMs)
    }

    return sawLock
  }

  /** @returns `false` when another holder already set the marker. */
  async tryEnterExclusive(): Promise<boolean> {
    return await this.deps.store.setIfAbsent(this.opts.lockKey, this.opts.lockKey)
  }

  async exit(): Promise<void> {
    await this.deps.store.del([this.opts.lockKey])
  }

  /**
   * Run `fn` holding the marker, or return `null` without running it when the
   * marker is already held. The marker is removed however `fn` settles.
   */
  async withExclusive<T>(fn: () => Promise<T>): Promise<T | null> {
    if (!(await this.tryEnterExclusive())) return null

    try {
      return await fn()
    } finally {
      await this.exit()
    }
  }
}
