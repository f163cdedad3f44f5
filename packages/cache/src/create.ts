import { type Clock, SystemClock } from "@keystash/clock"
import { createPinoLogger, type Logger } from "@keystash/logger"
import { MemoryCacheStore } from "./adapters/memory/memory-cache-store"
import { RedisCacheStore } from "./adapters/redis/redis-cache-store"
import { createRedisClient, type RedisBytesClient } from "./adapters/redis/redis-client"
import type { CacheConfig } from "./config/schema"
import { utf8Bytes } from "./core/bytes"
import { CacheEngine } from "./core/cache-engine"
import type { CacheOptions } from "./ports/cache-options"
import type { Serializer } from "./ports/serializer"

export type CacheSerializers<K, V> = {
  valueSerializer: Serializer<V>
  keySerializer?: Serializer<K> | undefined
}

export type CreateCacheOptions<K, V> = CacheOptions &
  CacheSerializers<K, V> & {
    /** @default new SystemClock() */
    clock?: Clock | undefined
    logger?: Logger | undefined
  }

export type CreateRedisCacheOptions<K, V> = CreateCacheOptions<K, V> & {
  client: RedisBytesClient
}

/**
 * @remarks
 * Caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisCache<K = Uint8Array, V = Uint8Array>(
  options: CreateRedisCacheOptions<K, V>,
): CacheEngine<K, V> {
  const { client, clock, logger, keySerializer, valueSerializer, ...cacheOptions } = options

  return new CacheEngine<K, V>(
    {
      store: new RedisCacheStore({ client }),
      clock: clock ?? new SystemClock(),
      valueSerializer,
      keySerializer,
      logger,
    },
    cacheOptions,
  )
}

export function createMemoryCache<K = Uint8Array, V = Uint8Array>(
  options: CreateCacheOptions<K, V>,
): CacheEngine<K, V> {
  const { clock = new SystemClock(), logger, keySerializer, valueSerializer, ...cacheOptions } =
    options

  return new CacheEngine<K, V>(
    {
      store: new MemoryCacheStore({ clock }),
      clock,
      valueSerializer,
      keySerializer,
      logger,
    },
    cacheOptions,
  )
}

export function cacheOptionsFromConfig(config: CacheConfig): CacheOptions {
  return {
    name: config.cache.name,
    expirationSeconds: config.cache.expirationSeconds,
    lockPollMs: config.cache.lockPollMs,
    pageSize: config.cache.pageSize,
    ...(config.cache.prefix.length > 0 && { prefix: utf8Bytes(config.cache.prefix) }),
  }
}

export type CacheServices<K, V> = {
  cache: CacheEngine<K, V>
  redisClient: RedisBytesClient
  logger: Logger
}

/**
 * Wire a Redis-backed cache from loaded configuration.
 *
 * @remarks
 * The client is returned unconnected.
 */
export function createCacheServices<K = Uint8Array, V = Uint8Array>(
  config: CacheConfig,
  serializers: CacheSerializers<K, V>,
): CacheServices<K, V> {
  const logger = createPinoLogger(
    {},
    { level: config.logging.level, prettify: config.logging.prettify },
  )

  const redisClient = createRedisClient({ url: config.redis.url })

  const cache = createRedisCache<K, V>({
    ...cacheOptionsFromConfig(config),
    ...serializers,
    client: redisClient,
    logger,
  })

  return { cache, redisClient, logger }
}
