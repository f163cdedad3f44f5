export { MemoryCacheStore, type MemoryCacheStoreDeps } from "./adapters/memory/memory-cache-store"
export { RedisCacheStore, type RedisCacheStoreDeps } from "./adapters/redis/redis-cache-store"
export {
  createRedisClient,
  type RedisBytesClient,
  type RedisBytesClientOptions,
} from "./adapters/redis/redis-client"
export { loadCacheConfig, mapEnvToConfig } from "./config/load-cache-config"
export { type CacheConfig, type CacheEnvConfig, cacheEnvSchema } from "./config/schema"
export { CacheEngine, type CacheEngineDeps } from "./core/cache-engine"
export {
  CacheConfigError,
  SerializationError,
  type SerializationErrorCode,
  TransportError,
  type TransportErrorCode,
  ValueRetrievalError,
} from "./core/cache-errors"
export { DEFAULT_LOCK_POLL_MS, DEFAULT_PAGE_SIZE } from "./core/cache-options"
export { KeyCodec } from "./core/key-codec"
export { KeyIndex, type KeyIndexDeps, type KeyIndexOptions } from "./core/key-index"
export {
  LockCoordinator,
  type LockCoordinatorDeps,
  type LockCoordinatorOptions,
} from "./core/lock-coordinator"
export { createJsonSerializer } from "./core/serializers/json-serializer"
export { rawBytesSerializer } from "./core/serializers/raw-bytes-serializer"
export { stringSerializer } from "./core/serializers/string-serializer"
export {
  type CacheServices,
  type CacheSerializers,
  type CreateCacheOptions,
  type CreateRedisCacheOptions,
  cacheOptionsFromConfig,
  createCacheServices,
  createMemoryCache,
  createRedisCache,
} from "./create"
export type { Cache } from "./ports/cache"
export type { CacheOptions } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { CacheStore, CacheStoreTransaction, TransactionReply } from "./ports/cache-store"
export type { ReadThrough } from "./ports/read-through"
export type { Serializer } from "./ports/serializer"
