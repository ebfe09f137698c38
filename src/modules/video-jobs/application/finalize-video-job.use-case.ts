import { Result } from '@core/domain/result'
import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'
import type { DatabaseError } from '@core/errors/database.error'
import { InvalidVideoJobIdError } from '@core/errors/video-job.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { msToNs, toErrorPayload } from '@core/libs/logging/log-event'
import type { VideoJobRepository } from '@modules/video-jobs/domain/repositories/video-job.repository'

export type FinalizeVideoJobUseCaseResult = {
  id: string
  status: 'finalized'
}

/**
 * Idempotent. A well-formed id that matches nothing is still answered as
 * finalized.
 */
export class FinalizeVideoJobUseCase {
  constructor(
    private readonly videoJobRepository: VideoJobRepository,
    private readonly logger: AbstractLoggerService,
  ) {}

  async execute(
    id: string,
  ): Promise<
    Result<FinalizeVideoJobUseCaseResult, InvalidVideoJobIdError | DatabaseError>
  > {
    const startTime = performance.now()
    const resource = 'FinalizeVideoJobUseCase'

    if (!UniqueEntityID.isValid(id)) {
      return Result.fail(InvalidVideoJobIdError.create())
    }

    const updated = await this.videoJobRepository.markFinalized(id)
    if (updated.isFailure) {
      this.logger.error('Finalize video job failed', {
        event: 'video_job.finalize.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
        error: toErrorPayload(updated.error),
        'video_job.id': id,
      })
      return Result.fail(updated.error)
    }

    this.logger.log('Finalize video job completed', {
      event: 'video_job.finalize.completed',
      resource,
      status: updated.value ? 'success' : 'skipped',
      duration: msToNs(performance.now() - startTime),
      'video_job.id': id,
      'video_job.matched': updated.value,
    })

    return Result.ok({ id, status: 'finalized' })
  }
}
