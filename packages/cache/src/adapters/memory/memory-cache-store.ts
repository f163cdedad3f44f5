import type { Clock, Milliseconds, Seconds } from "@keystash/clock"
import { compareBytes } from "../../core/bytes"
import { TransportError } from "../../core/cache-errors"
import type {
  CacheStore,
  CacheStoreTransaction,
  TransactionReply,
} from "../../ports/cache-store"

type StringEntry = {
  kind: "string"
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

type SortedSetMember = {
  score: number
  member: Uint8Array
}

type SortedSetEntry = {
  kind: "zset"
  members: Map<string, SortedSetMember>
  expiresAtMs?: Milliseconds
}

type StoreEntry = StringEntry | SortedSetEntry

export type MemoryCacheStoreDeps = {
  clock: Clock
}

const WRONG_TYPE = "WRONGTYPE Operation against a key holding the wrong kind of value"

/** Entries inspected for expiry on each `exec()`. */
const SWEEP_BUDGET = 20

function keyId(key: Uint8Array): string {
  return Buffer.from(key.buffer, key.byteOffset, key.byteLength).toString("hex")
}

function copyBytes(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(bytes)
}

function cloneEntry(entry: StoreEntry): StoreEntry {
  if (entry.kind === "string") return { ...entry }

  return { ...entry, members: new Map(entry.members) }
}

/**
 * In-process `CacheStore` with the Redis semantics the cache relies on.
 *
 * @remarks
 * Expiry is evaluated lazily against `clock`, and each `exec()` also purges
 * a few expired entries. Unlike Redis, a transaction whose command fails at
 * exec time is rolled back as a whole.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, StoreEntry>()
  private sweepCursor: Iterator<[string, StoreEntry]> | undefined

  constructor(private readonly deps: MemoryCacheStoreDeps) {}

  async get(key: Uint8Array): Promise<Uint8Array | null> {
    const entry = this.live(keyId(key))
    if (!entry) return null
    if (entry.kind !== "string") throw this.wrongType("GET")

    return new Uint8Array(entry.value)
  }

  async set(key: Uint8Array, value: Uint8Array): Promise<void> {
    this.setNow(key, value)
  }

  async setIfAbsent(
    key: Uint8Array,
    value: Uint8Array,
    expirationSeconds: Seconds = 0,
  ): Promise<boolean> {
    return this.setIfAbsentNow(key, value, expirationSeconds)
  }

  async del(keys: readonly Uint8Array[]): Promise<number> {
    return this.delNow(keys)
  }

  async exists(key: Uint8Array): Promise<boolean> {
    return this.live(keyId(key)) !== undefined
  }

  async expire(key: Uint8Array, seconds: Seconds): Promise<boolean> {
    return this.expireNow(key, seconds)
  }

  async zAdd(setKey: Uint8Array, score: number, member: Uint8Array): Promise<boolean> {
    return this.zAddNow(setKey, score, member)
  }

  async zRange(setKey: Uint8Array, start: number, stop: number): Promise<Uint8Array[]> {
    const entry = this.live(keyId(setKey))
    if (!entry) return []
    if (entry.kind !== "zset") throw this.wrongType("ZRANGE")

    const sorted = [...entry.members.values()].sort(
      (a, b) => a.score - b.score || compareBytes(a.member, b.member),
    )

    const length = sorted.length
    const from = start < 0 ? Math.max(length + start, 0) : start
    const to = stop < 0 ? length + stop : Math.min(stop, length - 1)
    if (from > to || from >= length) return []

    return sorted.slice(from, to + 1).map(({ member }) => new Uint8Array(member))
  }

  async zRem(setKey: Uint8Array, members: readonly Uint8Array[]): Promise<number> {
    return this.zRemNow(setKey, members)
  }

  /** Entries held, including expired ones not purged yet. */
  size(): number {
    return this.entries.size
  }

  multi(): CacheStoreTransaction {
    const queued: Array<() => TransactionReply> = []
    const touched = new Set<string>()

    const queue = (keys: readonly Uint8Array[], command: () => TransactionReply): void => {
      for (const key of keys) touched.add(keyId(key))
      queued.push(command)
    }

    return {
      set: (key, value) => {
        const [k, v] = [copyBytes(key), copyBytes(value)]
        queue([k], () => {
          this.setNow(k, v)
          return true
        })
      },
      setIfAbsent: (key, value, expirationSeconds = 0) => {
        const [k, v] = [copyBytes(key), copyBytes(value)]
        queue([k], () => this.setIfAbsentNow(k, v, expirationSeconds))
      },
      del: (keys) => {
        const ks = keys.map((key) => copyBytes(key))
        queue(ks, () => this.delNow(ks))
      },
      expire: (key, seconds) => {
        const k = copyBytes(key)
        queue([k], () => this.expireNow(k, seconds))
      },
      zAdd: (setKey, score, member) => {
        const [k, m] = [copyBytes(setKey), copyBytes(member)]
        queue([k], () => this.zAddNow(k, score, m))
      },
      zRem: (setKey, members) => {
        const k = copyBytes(setKey)
        const ms = members.map((member) => copyBytes(member))
        queue([k], () => this.zRemNow(k, ms))
      },
      exec: async () => {
        const commands = queued.splice(0)
        const ids = [...touched]
        touched.clear()

        this.sweepExpired()

        const snapshot = new Map<string, StoreEntry | undefined>()
        for (const id of ids) {
          const entry = this.entries.get(id)
          snapshot.set(id, entry && cloneEntry(entry))
        }

        try {
          return commands.map((command) => command())
        } catch (err) {
          for (const [id, entry] of snapshot) {
            if (entry) this.entries.set(id, entry)
            else this.entries.delete(id)
          }
          throw err
        }
      },
    }
  }

  private setNow(key: Uint8Array, value: Uint8Array): void {
    this.entries.set(keyId(key), { kind: "string", value: new Uint8Array(value) })
  }

  private setIfAbsentNow(key: Uint8Array, value: Uint8Array, expirationSeconds: Seconds): boolean {
    const id = keyId(key)
    if (this.live(id)) return false

    this.entries.set(id, {
      kind: "string",
      value: new Uint8Array(value),
      ...(expirationSeconds > 0 && { expiresAtMs: this.expiresAt(expirationSeconds) }),
    })

    return true
  }

  private delNow(keys: readonly Uint8Array[]): number {
    let removed = 0

    for (const key of keys) {
      const id = keyId(key)
      if (this.live(id)) {
        this.entries.delete(id)
        removed++
      }
    }

    return removed
  }

  private expireNow(key: Uint8Array, seconds: Seconds): boolean {
    const id = keyId(key)
    const entry = this.live(id)
    if (!entry) return false

    if (seconds <= 0) {
      this.entries.delete(id)
    } else {
      entry.expiresAtMs = this.expiresAt(seconds)
    }

    return true
  }

  private zAddNow(setKey: Uint8Array, score: number, member: Uint8Array): boolean {
    const id = keyId(setKey)
    const existing = this.live(id)
    if (existing && existing.kind !== "zset") throw this.wrongType("ZADD")

    const entry: SortedSetEntry = existing ?? { kind: "zset", members: new Map() }
    this.entries.set(id, entry)

    const memberId = keyId(member)
    const added = !entry.members.has(memberId)
    entry.members.set(memberId, { score, member: new Uint8Array(member) })

    return added
  }

  private zRemNow(setKey: Uint8Array, members: readonly Uint8Array[]): number {
    const id = keyId(setKey)
    const entry = this.live(id)
    if (!entry) return 0
    if (entry.kind !== "zset") throw this.wrongType("ZREM")

    let removed = 0
    for (const member of members) {
      if (entry.members.delete(keyId(member))) removed++
    }

    if (entry.members.size === 0) this.entries.delete(id)

    return removed
  }

  private sweepExpired(): void {
    for (let i = 0; i < SWEEP_BUDGET; i++) {
      this.sweepCursor ??= this.entries.entries()

      const next = this.sweepCursor.next()
      if (next.done) {
        this.sweepCursor = undefined
        return
      }

      this.live(next.value[0])
    }
  }

  private live(id: string): StoreEntry | undefined {
    const entry = this.entries.get(id)
    if (!entry) return undefined

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.entries.delete(id)
      return undefined
    }

    return entry
  }

  private expiresAt(seconds: Seconds): Milliseconds {
    return this.deps.clock.nowMs() + seconds * 1000
  }

  private wrongType(command: string): TransportError {
    return TransportError.commandFailed(command, new Error(WRONG_TYPE))
  }
}
