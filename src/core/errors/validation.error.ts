import { BaseError } from '@core/errors/base.error'
import type { ZodError } from 'zod'

export type ValidationIssue = {
  path: string
  message: string
}

export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_ERROR'

  private constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super(message)
  }

  static create(issues: ValidationIssue[], message = 'Validation failed') {
    return new ValidationError(message, issues)
  }

  static fromZod(error: ZodError) {
    return ValidationError.create(
      error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    )
  }

  override toJSON() {
    return { ...super.toJSON(), issues: this.issues }
  }
}
