type ErrorCause = { name: string; message: string } | string

export interface SerializedError {
  code: string
  message: string
  name: string
  stack?: string
  cause?: ErrorCause
}

/**
 * Root of every failure a use case or repository hands back in a `Result`.
 * Subclasses pin a stable `code`; the original driver or filesystem error,
 * when there is one, travels as `cause` and never reaches a response body.
 */
export abstract class BaseError extends Error {
  abstract readonly code: string

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = new.target.name
  }

  toJSON(): SerializedError {
    const json: SerializedError = {
      code: this.code,
      message: this.message,
      name: this.name,
      stack: this.stack,
    }
    if (this.cause !== undefined) json.cause = describeCause(this.cause)
    return json
  }
}

function describeCause(cause: unknown): ErrorCause {
  if (cause instanceof Error) return { name: cause.name, message: cause.message }
  return String(cause)
}
