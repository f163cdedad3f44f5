/**
 * Byte codec for cache keys or values.
 *
 * @remarks
 * Both directions are total over the types a serializer supports; anything
 * else must throw. The engine reports such failures as `SerializationError`.
 */
export interface Serializer<T> {
  serialize(value: T): Uint8Array
  deserialize(bytes: Uint8Array): T
}
