import superjson from "superjson"
import type { Serializer } from "../../ports/serializer"
import { utf8Bytes, utf8Text } from "../bytes"

/**
 * UTF-8 JSON through superjson, so `Date`, `Map`, `Set`, `BigInt` and
 * `undefined` survive a round trip.
 *
 * @remarks
 * The type parameter is trusted on the way back; validate the decoded value
 * when the store may hold data written by other code.
 */
export function createJsonSerializer<T>(): Serializer<T> {
  return {
    serialize(value: T): Uint8Array {
      return utf8Bytes(superjson.stringify(value))
    },

    deserialize(bytes: Uint8Array): T {
      return superjson.parse<T>(utf8Text(bytes))
    },
  }
}
