export type CacheHit<T> = {
  readonly kind: "hit"
  readonly value: T
}

export type CacheMiss = {
  readonly kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss
