import type { Serializer } from "../../ports/serializer"
import { utf8Bytes, utf8Text } from "../bytes"
import { SerializationError } from "../cache-errors"

export const stringSerializer: Serializer<string> = {
  serialize(value: string): Uint8Array {
    if (typeof value !== "string") {
      throw SerializationError.unsupportedValue("stringSerializer", value)
    }

    return utf8Bytes(value)
  },

  deserialize(bytes: Uint8Array): string {
    return utf8Text(bytes)
  },
}
