import type { Serializer } from "../ports/serializer"
import { SerializationError } from "./cache-errors"

export class ValueCodec<V> {
  constructor(private readonly serializer: Serializer<V>) {}

  encode(value: V): Uint8Array {
    try {
      return this.serializer.serialize(value)
    } catch (err) {
      throw SerializationError.serializeFailed("value", err)
    }
  }

  decode(bytes: Uint8Array): V {
    try {
      return this.serializer.deserialize(bytes)
    } catch (err) {
      throw SerializationError.deserializeFailed("value", err)
    }
  }
}
