import type { Serializer } from "../../ports/serializer"
import { SerializationError } from "../cache-errors"

/**
 * Identity codec for callers that already hold bytes.
 */
export const rawBytesSerializer: Serializer<Uint8Array> = {
  serialize(value: Uint8Array): Uint8Array {
    if (!(value instanceof Uint8Array)) {
      throw SerializationError.unsupportedValue("rawBytesSerializer", value)
    }

    return value
  },

  deserialize(bytes: Uint8Array): Uint8Array {
    return bytes
  },
}
