import { BaseError } from '@core/errors/base.error'

export class EmailAlreadyRegisteredError extends BaseError {
  readonly code = 'EMAIL_ALREADY_REGISTERED'

  static create() {
    return new EmailAlreadyRegisteredError('Email already registered')
  }
}

/**
 * Same error for an unknown email and a wrong password, so callers cannot
 * tell which accounts exist.
 */
export class InvalidCredentialsError extends BaseError {
  readonly code = 'INVALID_CREDENTIALS'

  static create() {
    return new InvalidCredentialsError('Invalid credentials')
  }
}
