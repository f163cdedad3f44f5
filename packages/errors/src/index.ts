export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
