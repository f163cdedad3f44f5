import type { Seconds } from "@keystash/clock"
import { ErrorReply } from "redis"
import { TransportError } from "../../core/cache-errors"
import type {
  CacheStore,
  CacheStoreTransaction,
  TransactionReply,
} from "../../ports/cache-store"
import type { RedisBytesClient, RedisBytesMulti, RedisSetOptions } from "./redis-client"

function toBuffer(value: Uint8Array): Buffer {
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
}

function toBytes(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer)
}

/**
 * Redis replies (`WRONGTYPE`, `EXECABORT`, ...) are command failures; anything
 * else means the connection itself is in trouble.
 */
function toTransportError(command: string, err: unknown): TransportError {
  if (err instanceof TransportError) return err
  if (err instanceof ErrorReply) return TransportError.commandFailed(command, err)

  return TransportError.unavailable(command, err)
}

function setIfAbsentOptions(expirationSeconds: Seconds): RedisSetOptions {
  return expirationSeconds > 0
    ? { condition: "NX", expiration: { type: "EX", value: expirationSeconds } }
    : { condition: "NX" }
}

function toCount(reply: unknown): number {
  return typeof reply === "number" ? reply : 0
}

async function run<T>(command: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    throw toTransportError(command, err)
  }
}

/**
 * Queues into a node-redis `MULTI` and maps each raw reply back to what the
 * matching `CacheStore` method returns.
 */
class RedisCacheStoreTransaction implements CacheStoreTransaction {
  private readonly replies: Array<(raw: unknown) => TransactionReply> = []

  constructor(private readonly tx: RedisBytesMulti) {}

  set(key: Uint8Array, value: Uint8Array): void {
    this.tx.set(toBuffer(key), toBuffer(value))
    this.replies.push(() => true)
  }

  setIfAbsent(key: Uint8Array, value: Uint8Array, expirationSeconds: Seconds = 0): void {
    this.tx.set(toBuffer(key), toBuffer(value), setIfAbsentOptions(expirationSeconds))
    this.replies.push((raw) => raw !== null && raw !== undefined)
  }

  del(keys: readonly Uint8Array[]): void {
    this.tx.del(keys.map(toBuffer))
    this.replies.push(toCount)
  }

  expire(key: Uint8Array, seconds: Seconds): void {
    this.tx.expire(toBuffer(key), seconds)
    this.replies.push((raw) => toCount(raw) === 1)
  }

  zAdd(setKey: Uint8Array, score: number, member: Uint8Array): void {
    this.tx.zAdd(toBuffer(setKey), { score, value: toBuffer(member) })
    this.replies.push((raw) => toCount(raw) > 0)
  }

  zRem(setKey: Uint8Array, members: readonly Uint8Array[]): void {
    this.tx.zRem(toBuffer(setKey), members.map(toBuffer))
    this.replies.push(toCount)
  }

  async exec(): Promise<TransactionReply[]> {
    const replies = this.replies.splice(0)
    const raw = await run("EXEC", () => this.tx.exec())

    return replies.map((toReply, i) => toReply(raw[i]))
  }
}

export type RedisCacheStoreDeps = {
  client: RedisBytesClient
}

export class RedisCacheStore implements CacheStore {
  constructor(private readonly deps: RedisCacheStoreDeps) {}

  async get(key: Uint8Array): Promise<Uint8Array | null> {
    const buffer = await run("GET", () => this.deps.client.get(toBuffer(key)))

    return buffer === null ? null : toBytes(buffer)
  }

  async set(key: Uint8Array, value: Uint8Array): Promise<void> {
    await run("SET", () => this.deps.client.set(toBuffer(key), toBuffer(value)))
  }

  async setIfAbsent(
    key: Uint8Array,
    value: Uint8Array,
    expirationSeconds: Seconds = 0,
  ): Promise<boolean> {
    const reply = await run("SET", () =>
      this.deps.client.set(toBuffer(key), toBuffer(value), setIfAbsentOptions(expirationSeconds)),
    )

    return reply !== null
  }

  async del(keys: readonly Uint8Array[]): Promise<number> {
    if (keys.length === 0) return 0

    return await run("DEL", () => this.deps.client.del(keys.map(toBuffer)))
  }

  async exists(key: Uint8Array): Promise<boolean> {
    const count = await run("EXISTS", () => this.deps.client.exists(toBuffer(key)))

    return count > 0
  }

  async expire(key: Uint8Array, seconds: Seconds): Promise<boolean> {
    const applied = await run("EXPIRE", () => this.deps.client.expire(toBuffer(key), seconds))

    return applied === 1
  }

  async zAdd(setKey: Uint8Array, score: number, member: Uint8Array): Promise<boolean> {
    const added = await run("ZADD", () =>
      this.deps.client.zAdd(toBuffer(setKey), { score, value: toBuffer(member) }),
    )

    return added > 0
  }

  async zRange(setKey: Uint8Array, start: number, stop: number): Promise<Uint8Array[]> {
    const members = await run("ZRANGE", () =>
      this.deps.client.zRange(toBuffer(setKey), start, stop),
    )

    return members.map(toBytes)
  }

  async zRem(setKey: Uint8Array, members: readonly Uint8Array[]): Promise<number> {
    if (members.length === 0) return 0

    return await run("ZREM", () => this.deps.client.zRem(toBuffer(setKey), members.map(toBuffer)))
  }

  multi(): CacheStoreTransaction {
    return new RedisCacheStoreTransaction(this.deps.client.multi())
  }
}
