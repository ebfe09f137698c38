import { BaseElysia } from '@core/libs/elysia'
import { FinalizeVideoJobUseCase } from '@modules/video-jobs/application/finalize-video-job.use-case'
import type { VideoJobDependencies } from './index'

export const createFinalizeVideoJobRoute = ({
  videoJobRepository,
}: VideoJobDependencies) =>
  BaseElysia.create().post(
    '/:id/finalize',
    async ({ params, logger, set }) => {
      const useCase = new FinalizeVideoJobUseCase(videoJobRepository, logger)

      const result = await useCase.execute(params.id)
      if (result.isFailure) return BaseElysia.reply(set, result.error)

      return result.value
    },
    {
      detail: {
        tags: ['Video Jobs'],
        summary: 'Finalize a video job',
        description:
          'Sets the status to "finalized". Repeating the call is harmless; a malformed id answers 400.',
      },
    },
  )
