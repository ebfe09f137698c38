import { Result } from '@core/domain/result'
import type { DatabaseError } from '@core/errors/database.error'
import { ValidationError } from '@core/errors/validation.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { msToNs, toErrorPayload } from '@core/libs/logging/log-event'
import { CreateVideoJobSchema } from '@modules/video-jobs/application/video-job.schemas'
import { VideoJob } from '@modules/video-jobs/domain/entities/video-job'
import type { VideoJobRepository } from '@modules/video-jobs/domain/repositories/video-job.repository'
import { AspectRatioVO } from '@modules/video-jobs/domain/value-objects/aspect-ratio.vo'
import { DurationVO } from '@modules/video-jobs/domain/value-objects/duration.vo'
import type { VideoJobStatus } from '@modules/video-jobs/domain/value-objects/video-job-status.vo'

export type CreateVideoJobUseCaseResult = {
  id: string
  status: VideoJobStatus
}

export class CreateVideoJobUseCase {
  constructor(
    private readonly videoJobRepository: VideoJobRepository,
    private readonly logger: AbstractLoggerService,
  ) {}

  async execute(
    payload: unknown,
  ): Promise<
    Result<CreateVideoJobUseCaseResult, ValidationError | DatabaseError>
  > {
    const startTime = performance.now()
    const resource = 'CreateVideoJobUseCase'

    const parsed = CreateVideoJobSchema.safeParse(payload)
    if (!parsed.success) {
      const error = ValidationError.fromZod(parsed.error)
      this.logger.warn('Create video job rejected', {
        event: 'video_job.create.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
        issues: error.issues,
      })
      return Result.fail(error)
    }

    const input = parsed.data
    const duration = DurationVO.create(input.duration_seconds)
    if (duration.isFailure) return Result.fail(duration.error)

    const job = VideoJob.create({
      ownerEmail: input.owner_email,
      projectName: input.project_name,
      brandName: input.brand_name,
      brandDetail: input.brand_detail,
      creativePrompt: input.creative_prompt,
      targetAudience: input.target_audience,
      videoStyle: input.video_style,
      aspectRatio: AspectRatioVO.from(input.aspect_ratio),
      duration: duration.value,
      assets: {
        productImageUrl: input.product_image_url,
        brandLogoUrl: input.brand_logo_url,
        brandGuidelineUrl: input.brand_guideline_url,
        referenceImageUrl: input.reference_image_url,
      },
    })

    const created = await this.videoJobRepository.create(job)
    if (created.isFailure) {
      this.logger.error('Create video job failed', {
        event: 'video_job.create.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
        error: toErrorPayload(created.error),
      })
      return Result.fail(created.error)
    }

    this.logger.log('Create video job completed', {
      event: 'video_job.create.completed',
      resource,
      status: 'success',
      duration: msToNs(performance.now() - startTime),
      'video_job.id': job.id.value,
      'video_job.aspect_ratio': job.aspectRatio.value,
      'video_job.duration_seconds': job.duration.seconds,
    })

    return Result.ok({ id: job.id.value, status: job.status.value })
  }
}
