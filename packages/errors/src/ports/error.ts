export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (keys, sizes, names) so callers never
 * have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when the same call may succeed if repeated later. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (store offline, bad input);
   * `false` for programmer errors such as a value no serializer can handle.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
