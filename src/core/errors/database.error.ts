import { BaseError } from '@core/errors/base.error'

export class DatabaseConnectionError extends BaseError {
  readonly code = 'DATABASE_CONNECTION_ERROR'

  static create(message: string, cause?: unknown) {
    return new DatabaseConnectionError(message, cause)
  }
}

export class DatabaseDisconnectionError extends BaseError {
  readonly code = 'DATABASE_DISCONNECTION_ERROR'

  static create(message: string) {
    return new DatabaseDisconnectionError(message)
  }
}

export class DatabaseExecutionError extends BaseError {
  readonly code = 'DATABASE_EXECUTION_ERROR'

  static create(message: string, cause?: unknown) {
    return new DatabaseExecutionError(message, cause)
  }
}

/**
 * Raised before any round trip when the datasource has no live connection,
 * either because it was never configured or because connecting failed.
 */
export class DatabaseUnavailableError extends BaseError {
  readonly code = 'DATABASE_UNAVAILABLE'

  static create(message = 'Database not available') {
    return new DatabaseUnavailableError(message)
  }
}

export type DatabaseError = DatabaseExecutionError | DatabaseUnavailableError
