import { BaseError } from '@core/errors/base.error'

export class VideoJobNotFoundError extends BaseError {
  readonly code = 'VIDEO_JOB_NOT_FOUND'

  static create() {
    return new VideoJobNotFoundError('Not found')
  }
}

export class InvalidVideoJobIdError extends BaseError {
  readonly code = 'INVALID_VIDEO_JOB_ID'

  static create() {
    return new InvalidVideoJobIdError('Invalid id')
  }
}
