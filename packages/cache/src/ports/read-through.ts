/**
 * Read-through access: serve from the cache, or load, store and return.
 */
export interface ReadThrough<K, V> {
  getThrough(key: K, loader: () => Promise<V>): Promise<V>
}
