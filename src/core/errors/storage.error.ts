import { BaseError } from '@core/errors/base.error'

export class StagingStorageError extends BaseError {
  readonly code = 'STAGING_STORAGE_ERROR'

  static create(message: string, cause?: unknown) {
    return new StagingStorageError(message, cause)
  }
}
