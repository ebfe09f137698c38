import { BaseElysia } from '@core/libs/elysia'
import { UploadFileUseCase } from '@modules/uploads/application/upload-file.use-case'
import type { StagingStorage } from '@modules/uploads/domain/services/staging-storage'

export const createUploadRoute = (stagingStorage: StagingStorage) =>
  BaseElysia.create().post(
    '/upload',
    async ({ body, logger, set }) => {
      const useCase = new UploadFileUseCase(stagingStorage, logger)

      const result = await useCase.execute(body)
      if (result.isFailure) return BaseElysia.reply(set, result.error)

      return result.value
    },
    {
      detail: {
        tags: ['Uploads'],
        summary: 'Stage a file',
        description:
          'Multipart form with a `file` part. The file is kept under its original name and the answer is a placeholder URL.',
      },
    },
  )
