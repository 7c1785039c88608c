export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors, so callers never parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Normalizes a thrown value into an Error.
 *
 * - Error instances pass through unchanged
 * - anything else is wrapped, with the original kept in `context.value`
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value

  return new BaseError(typeof value === "string" ? value : "Non-error value thrown", {
    code: "non_error_thrown",
    context: { value },
  })
}
