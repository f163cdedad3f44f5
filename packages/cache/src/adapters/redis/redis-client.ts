import { createClient, type RedisClientOptions, RESP_TYPES } from "redis"

export type RedisSetOptions = {
  condition?: "NX" | "XX"
  expiration?: { type: "EX" | "PX"; value: number }
}

export type RedisSortedSetMember = {
  score: number
  value: Buffer
}

export type RedisBytesMulti = {
  set(key: Buffer, value: Buffer, opts?: RedisSetOptions): unknown
  del(keys: Buffer[]): unknown
  expire(key: Buffer, seconds: number): unknown
  zAdd(key: Buffer, members: RedisSortedSetMember): unknown
  zRem(key: Buffer, members: Buffer[]): unknown
  exec(): Promise<unknown[]>
}

/**
 * The node-redis commands the cache store issues, with bulk strings mapped
 * to `Buffer`.
 */
export type RedisBytesClient = {
  get(key: Buffer): Promise<Buffer | null>
  set(key: Buffer, value: Buffer, opts?: RedisSetOptions): Promise<string | Buffer | null>
  del(keys: Buffer[]): Promise<number>
  exists(keys: Buffer): Promise<number>
  expire(key: Buffer, seconds: number): Promise<number>

  zAdd(key: Buffer, members: RedisSortedSetMember): Promise<number>
  zRange(key: Buffer, start: number, stop: number): Promise<Buffer[]>
  zRem(key: Buffer, members: Buffer[]): Promise<number>

  multi(): RedisBytesMulti

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Caller owns `connect()` / `quit()`.
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
