import type { Serializer } from "../../ports/serializer"
import { text } from "../../tests/utils/cache-test-helpers"
import { SerializationError } from "../cache-errors"
import { KeyCodec } from "../key-codec"
import { stringSerializer } from "../serializers/string-serializer"

describe("KeyCodec", () => {
  it("passes byte keys through when no serializer is configured", () => {
    const key = text("order:1")
    const codec = new KeyCodec<Uint8Array>(undefined, text("ignored:"))

    expect(codec.computeKey(key)).toBe(key)
  })

  it("rejects non-byte keys when no serializer is configured", () => {
    const codec = new KeyCodec<string>(undefined)

    expect(() => codec.computeKey("order:1")).toThrow(SerializationError)
    expect(() => codec.computeKey("order:1")).toThrow(
      "No key serializer configured and the key is not a Uint8Array (got string)",
    )
  })

  it("serializes without a prefix", () => {
    const codec = new KeyCodec(stringSerializer)

    expect(codec.computeKey("order:1")).toStrictEqual(text("order:1"))
  })

  it("prepends the prefix to the serialized key", () => {
    const codec = new KeyCodec(stringSerializer, text("app:"))

    expect(codec.computeKey("1")).toStrictEqual(text("app:1"))
  })

  it("returns a fresh array that does not alias the serializer output", () => {
    const serialized = text("1")
    const serializer: Serializer<string> = {
      serialize: () => serialized,
      deserialize: () => "",
    }
    const codec = new KeyCodec(serializer, text("p:"))

    const key = codec.computeKey("1")
    serialized[0] = 0

    expect(key).toStrictEqual(text("p:1"))
  })

  it("copies the prefix at construction", () => {
    const prefix = text("a:")
    const codec = new KeyCodec(stringSerializer, prefix)

    prefix[0] = "b".charCodeAt(0)

    expect(codec.computeKey("1")).toStrictEqual(text("a:1"))
  })

  it("wraps serializer failures", () => {
    const cause = new Error("unsupported key")
    const serializer: Serializer<string> = {
      serialize: () => {
        throw cause
      },
      deserialize: () => "",
    }

    expect(() => new KeyCodec(serializer).computeKey("1")).toThrow(
      expect.objectContaining({ code: "serialization_failed", cause }),
    )
  })
})
