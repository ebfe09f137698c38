import { Result } from '@core/domain/result'
import type { DatabaseError } from '@core/errors/database.error'
import { ValidationError } from '@core/errors/validation.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { msToNs, toErrorPayload } from '@core/libs/logging/log-event'
import { DashboardQuerySchema } from '@modules/video-jobs/application/video-job.schemas'
import { VideoJob } from '@modules/video-jobs/domain/entities/video-job'
import type { VideoJobRepository } from '@modules/video-jobs/domain/repositories/video-job.repository'

export type DashboardSummary = {
  total: number
  processing: number
  videos: VideoJob[]
}

export class GetDashboardSummaryUseCase {
  static readonly LATEST_LIMIT = 20

  constructor(
    private readonly videoJobRepository: VideoJobRepository,
    private readonly logger: AbstractLoggerService,
  ) {}

  async execute(
    query: unknown,
  ): Promise<Result<DashboardSummary, ValidationError | DatabaseError>> {
    const startTime = performance.now()
    const resource = 'GetDashboardSummaryUseCase'

    const parsed = DashboardQuerySchema.safeParse(query)
    if (!parsed.success) return Result.fail(ValidationError.fromZod(parsed.error))

    const { email } = parsed.data

    const [total, processing, videos] = await Promise.all([
      this.videoJobRepository.countByOwner(email),
      this.videoJobRepository.countInFlightByOwner(email),
      this.videoJobRepository.latestByOwner(
        email,
        GetDashboardSummaryUseCase.LATEST_LIMIT,
      ),
    ])

    for (const result of [total, processing, videos]) {
      if (result.isFailure) {
        this.logger.error('Dashboard summary failed', {
          event: 'dashboard.summary.completed',
          resource,
          status: 'failure',
          duration: msToNs(performance.now() - startTime),
          error: toErrorPayload(result.error),
        })
        return Result.fail(result.error)
      }
    }

    this.logger.log('Dashboard summary completed', {
      event: 'dashboard.summary.completed',
      resource,
      status: 'success',
      duration: msToNs(performance.now() - startTime),
      'dashboard.total': total.value,
    })

    return Result.ok({
      total: total.value,
      processing: processing.value,
      videos: videos.value,
    })
  }
}
