import { BaseElysia } from '@core/libs/elysia'
import { GetVideoJobUseCase } from '@modules/video-jobs/application/get-video-job.use-case'
import { VideoJobPresenter } from '@modules/video-jobs/application/video-job.presenter'
import type { VideoJobDependencies } from './index'

export const createGetVideoJobRoute = ({
  videoJobRepository,
}: VideoJobDependencies) =>
  BaseElysia.create().get(
    '/:id',
    async ({ params, logger, set }) => {
      const useCase = new GetVideoJobUseCase(videoJobRepository, logger)

      const result = await useCase.execute(params.id)
      if (result.isFailure) return BaseElysia.reply(set, result.error)

      return VideoJobPresenter.toHttp(result.value)
    },
    {
      detail: {
        tags: ['Video Jobs'],
        summary: 'Get a video job',
        description: 'Answers 404 for malformed and unknown ids alike.',
      },
    },
  )
