export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (loader names, key counts, inputs).
 * Carry data here instead of interpolating it into the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) or programmer error / broken invariant
   * (`false`).
   *
   * @remarks
   * A batch fetch timing out is operational. Registering a view on a registry
   * that already executed, or a reconciler returning the wrong number of
   * values, is not.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
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
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
