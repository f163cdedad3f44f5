import { ErrorReply } from "redis"
import {
  CacheConfigError,
  SerializationError,
  TransportError,
  ValueRetrievalError,
} from "../cache-errors"

describe("cache errors", () => {
  it("SerializationError is non-operational and names the offending type", () => {
    const err = SerializationError.unsupportedValue("stringSerializer", 42)

    expect(err.name).toBe("SerializationError")
    expect(err.code).toBe("serialization_failed")
    expect(err.isOperational).toBe(false)
    expect(err.isRetryable).toBe(false)
    expect(err.message).toBe("stringSerializer cannot serialize number")
  })

  it("missingSerializer reports the constructor of object keys", () => {
    const err = SerializationError.missingSerializer("key", new Map())

    expect(err.code).toBe("serializer_missing")
    expect(err.context).toStrictEqual({ role: "key", received: "Map" })
  })

  it("serializeFailed does not wrap a SerializationError twice", () => {
    const inner = SerializationError.unsupportedValue("rawBytesSerializer", "x")

    expect(SerializationError.serializeFailed("value", inner)).toBe(inner)
    expect(SerializationError.deserializeFailed("value", inner)).toBe(inner)
  })

  it("serializeFailed keeps the cause", () => {
    const cause = new Error("circular")
    const err = SerializationError.serializeFailed("value", cause)

    expect(err.cause).toBe(cause)
    expect(err.context).toStrictEqual({ role: "value" })
  })

  it("TransportError.unavailable is retryable", () => {
    const err = TransportError.unavailable("GET", new Error("ECONNREFUSED"))

    expect(err.code).toBe("store_unavailable")
    expect(err.isRetryable).toBe(true)
    expect(err.message).toBe("Store unavailable during GET")
  })

  it("TransportError.commandFailed carries the reply text", () => {
    const reply = new ErrorReply("WRONGTYPE Operation against a key holding the wrong kind of value")
    const err = TransportError.commandFailed("ZADD", reply)

    expect(err.isRetryable).toBe(false)
    expect(err.message).toBe(
      "Store rejected ZADD: WRONGTYPE Operation against a key holding the wrong kind of value",
    )
    expect(err.toJSON()).toMatchObject({
      name: "TransportError",
      code: "store_command_failed",
      context: { command: "ZADD" },
      cause: { code: "unknown" },
    })
  })

  it("CacheConfigError names the field", () => {
    const err = CacheConfigError.invalid("pageSize", "must be a positive integer", 0)

    expect(err.message).toBe('Invalid cache option "pageSize": must be a positive integer')
    expect(err.context).toStrictEqual({ field: "pageSize", value: 0 })
  })

  it("ValueRetrievalError keeps the loader failure as cause", () => {
    const cause = new Error("db down")
    const err = ValueRetrievalError.loaderFailed("orders", cause)

    expect(err.code).toBe("value_retrieval_failed")
    expect(err.cause).toBe(cause)
    expect(err.message).toBe('Value loader failed for cache "orders"')
  })
})
