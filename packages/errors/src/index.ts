export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { isAppError } from "./core/utils/is-app-error"
export { toAppError } from "./core/utils/to-app-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  SerializedError,
} from "./ports/error"
