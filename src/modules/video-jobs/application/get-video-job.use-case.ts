import { Result } from '@core/domain/result'
import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'
import type { DatabaseError } from '@core/errors/database.error'
import { VideoJobNotFoundError } from '@core/errors/video-job.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { VideoJob } from '@modules/video-jobs/domain/entities/video-job'
import type { VideoJobRepository } from '@modules/video-jobs/domain/repositories/video-job.repository'

export class GetVideoJobUseCase {
  constructor(
    private readonly videoJobRepository: VideoJobRepository,
    private readonly logger: AbstractLoggerService,
  ) {}

  /**
   * A malformed id cannot match any job, so it is reported as not found
   * without a round trip.
   */
  async execute(
    id: string,
  ): Promise<Result<VideoJob, VideoJobNotFoundError | DatabaseError>> {
    if (!UniqueEntityID.isValid(id)) {
      this.logger.debug('Malformed video job id', { videoJobId: id })
      return Result.fail(VideoJobNotFoundError.create())
    }

    const found = await this.videoJobRepository.findById(id)
    if (found.isFailure) return Result.fail(found.error)

    if (!found.value) return Result.fail(VideoJobNotFoundError.create())

    return Result.ok(found.value)
  }
}
