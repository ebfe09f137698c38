import { BaseElysia } from '@core/libs/elysia'
import { GetDashboardSummaryUseCase } from '@modules/video-jobs/application/get-dashboard-summary.use-case'
import { VideoJobPresenter } from '@modules/video-jobs/application/video-job.presenter'
import type { VideoJobDependencies } from './index'

export const createDashboardRoute = ({
  videoJobRepository,
}: VideoJobDependencies) =>
  BaseElysia.create({ prefix: '/dashboard' }).get(
    '/summary',
    async ({ query, logger, set }) => {
      const useCase = new GetDashboardSummaryUseCase(videoJobRepository, logger)

      const result = await useCase.execute(query)
      if (result.isFailure) return BaseElysia.reply(set, result.error)

      const { total, processing, videos } = result.value
      return {
        total,
        processing,
        videos: videos.map((job) => VideoJobPresenter.toHttp(job)),
      }
    },
    {
      detail: {
        tags: ['Video Jobs'],
        summary: 'Dashboard summary for an owner',
        description:
          'Query: ?email=. Counts all jobs and those queued or processing, and lists the 20 newest.',
      },
    },
  )
