import {
  EmailAlreadyRegisteredError,
  InvalidCredentialsError,
} from '@core/errors/auth.error'
import { DatabaseExecutionError } from '@core/errors/database.error'
import { StagingStorageError } from '@core/errors/storage.error'
import {
  ValidationError,
  type ValidationIssue,
} from '@core/errors/validation.error'
import {
  InvalidVideoJobIdError,
  VideoJobNotFoundError,
} from '@core/errors/video-job.error'
import { loggerPlugin } from '@modules/logging/elysia'
import { correlationMiddleware } from '@modules/telemetry/correlation-context'
import { Elysia, StatusMap, type Context } from 'elysia'

export type ErrorBody = {
  message: string
  issues?: ValidationIssue[]
}

function statusOf(error: Error): number {
  if (error instanceof ValidationError) return StatusMap['Unprocessable Content']
  if (
    error instanceof EmailAlreadyRegisteredError ||
    error instanceof InvalidVideoJobIdError
  ) {
    return StatusMap['Bad Request']
  }
  if (error instanceof InvalidCredentialsError) return StatusMap.Unauthorized
  if (error instanceof VideoJobNotFoundError) return StatusMap['Not Found']
  return StatusMap['Internal Server Error']
}

export class BaseElysia {
  static create(options: ConstructorParameters<typeof Elysia>[0] = {}) {
    return new Elysia(options).use(loggerPlugin).use(correlationMiddleware)
  }

  /**
   * Maps a use case failure to its status code and the `{ message }` body
   * shared by every route. Driver and filesystem messages are not sent to clients.
   */
  static reply(set: Context['set'], error: Error): ErrorBody {
    set.status = statusOf(error)

    if (error instanceof ValidationError) {
      return { message: error.message, issues: error.issues }
    }
    if (error instanceof DatabaseExecutionError) {
      return { message: 'Database operation failed' }
    }
    if (error instanceof StagingStorageError) {
      return { message: 'Could not store the file' }
    }
    return { message: error.message }
  }
}
