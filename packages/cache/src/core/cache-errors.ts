import { BaseError } from "@keystash/errors"

export type SerializationErrorCode =
  | "serializer_missing"
  | "serialization_failed"
  | "deserialization_failed"

export type SerializedRole = "key" | "value"

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (typeof value !== "object") return typeof value

  return value.constructor?.name ?? "object"
}

/**
 * A key or value could not be turned into bytes, or bytes read back could
 * not be decoded.
 *
 * @remarks
 * Caused by configuration or caller bugs, so it is never retried.
 */
export class SerializationError extends BaseError<SerializationErrorCode> {
  static missingSerializer(role: SerializedRole, value: unknown): SerializationError {
    return new SerializationError(
      `No ${role} serializer configured and the ${role} is not a Uint8Array (got ${describeValue(value)})`,
      {
        code: "serializer_missing",
        context: { role, received: describeValue(value) },
        isOperational: false,
      },
    )
  }

  static unsupportedValue(serializer: string, value: unknown): SerializationError {
    return new SerializationError(`${serializer} cannot serialize ${describeValue(value)}`, {
      code: "serialization_failed",
      context: { serializer, received: describeValue(value) },
      isOperational: false,
    })
  }

  /** Reuses `cause` when it already is a `SerializationError`. */
  static serializeFailed(role: SerializedRole, cause: unknown): SerializationError {
    if (cause instanceof SerializationError) return cause

    return new SerializationError(`Failed to serialize ${role}`, {
      code: "serialization_failed",
      context: { role },
      cause,
      isOperational: false,
    })
  }

  static deserializeFailed(role: SerializedRole, cause: unknown): SerializationError {
    if (cause instanceof SerializationError) return cause

    return new SerializationError(`Failed to deserialize ${role}`, {
      code: "deserialization_failed",
      context: { role },
      cause,
      isOperational: false,
    })
  }
}

export type TransportErrorCode = "store_unavailable" | "store_command_failed"

/**
 * The backing store could not be reached or rejected a command.
 */
export class TransportError extends BaseError<TransportErrorCode> {
  static unavailable(command: string, cause: unknown): TransportError {
    return new TransportError(`Store unavailable during ${command}`, {
      code: "store_unavailable",
      context: { command },
      cause,
      isRetryable: true,
    })
  }

  static commandFailed(command: string, cause: unknown): TransportError {
    const reason = cause instanceof Error ? cause.message : String(cause)

    return new TransportError(`Store rejected ${command}: ${reason}`, {
      code: "store_command_failed",
      context: { command },
      cause,
    })
  }
}

export class CacheConfigError extends BaseError<"invalid_cache_config"> {
  static invalid(field: string, reason: string, value: unknown): CacheConfigError {
    return new CacheConfigError(`Invalid cache option "${field}": ${reason}`, {
      code: "invalid_cache_config",
      context: { field, value },
      isOperational: false,
    })
  }
}

/**
 * The loader passed to `getThrough` rejected.
 */
export class ValueRetrievalError extends BaseError<"value_retrieval_failed"> {
  static loaderFailed(cache: string, cause: unknown): ValueRetrievalError {
    return new ValueRetrievalError(`Value loader failed for cache "${cache}"`, {
      code: "value_retrieval_failed",
      context: { cache },
      cause,
    })
  }
}
