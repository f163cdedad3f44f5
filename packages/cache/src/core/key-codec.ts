import type { Serializer } from "../ports/serializer"
import { concatBytes } from "./bytes"
import { SerializationError } from "./cache-errors"

/**
 * Maps logical keys to the physical byte keys stored in the backing store.
 */
export class KeyCodec<K> {
  private readonly prefix: Uint8Array

  constructor(
    private readonly serializer: Serializer<K> | undefined,
    prefix: Uint8Array = new Uint8Array(0),
  ) {
    this.prefix = Uint8Array.from(prefix)
  }

  /**
   * Without a serializer, byte keys pass through untouched (no prefix).
   * With one, the serialized key is prefixed into a fresh array.
   */
  computeKey(key: K): Uint8Array {
    if (this.serializer === undefined) {
      if (key instanceof Uint8Array) return key

      throw SerializationError.missingSerializer("key", key)
    }

    let serialized: Uint8Array
    try {
      serialized = this.serializer.serialize(key)
    } catch (err) {
      throw SerializationError.serializeFailed("key", err)
    }

    if (this.prefix.byteLength === 0) return serialized

    return concatBytes(this.prefix, serialized)
  }
}
