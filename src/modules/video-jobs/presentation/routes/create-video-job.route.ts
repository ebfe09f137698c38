import { BaseElysia } from '@core/libs/elysia'
import { CreateVideoJobUseCase } from '@modules/video-jobs/application/create-video-job.use-case'
import type { VideoJobDependencies } from './index'

export const createCreateVideoJobRoute = ({
  videoJobRepository,
}: VideoJobDependencies) =>
  BaseElysia.create().post(
    '/create',
    async ({ body, logger, set }) => {
      const useCase = new CreateVideoJobUseCase(videoJobRepository, logger)

      const result = await useCase.execute(body)
      if (result.isFailure) return BaseElysia.reply(set, result.error)

      return result.value
    },
    {
      detail: {
        tags: ['Video Jobs'],
        summary: 'Record a video job',
        description:
          'Stores the brand, creative and asset details of a job with status "processing". aspect_ratio defaults to 16:9 and duration_seconds to 15.',
      },
    },
  )
