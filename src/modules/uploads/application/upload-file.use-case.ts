import { Result } from '@core/domain/result'
import type { StagingStorageError } from '@core/errors/storage.error'
import { ValidationError } from '@core/errors/validation.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { msToNs, toErrorPayload } from '@core/libs/logging/log-event'
import type { StagingStorage } from '@modules/uploads/domain/services/staging-storage'
import { z } from 'zod'

export const UploadFileSchema = z.object({
  file: z.instanceof(File, { message: 'Expected a file' }),
})

export type UploadFileUseCaseResult = {
  url: string
}

export class UploadFileUseCase {
  static readonly PUBLIC_PREFIX = '/uploads'

  constructor(
    private readonly stagingStorage: StagingStorage,
    private readonly logger: AbstractLoggerService,
  ) {}

  async execute(
    body: unknown,
  ): Promise<
    Result<UploadFileUseCaseResult, ValidationError | StagingStorageError>
  > {
    const startTime = performance.now()
    const resource = 'UploadFileUseCase'

    const parsed = UploadFileSchema.safeParse(body)
    if (!parsed.success) {
      return Result.fail(ValidationError.fromZod(parsed.error))
    }

    const { file } = parsed.data
    const content = new Uint8Array(await file.arrayBuffer())

    const staged = await this.stagingStorage.save(file.name, content)
    if (staged.isFailure) {
      this.logger.error('Upload failed', {
        event: 'upload.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
        error: toErrorPayload(staged.error),
      })
      return Result.fail(staged.error)
    }

    this.logger.log('Upload completed', {
      event: 'upload.completed',
      resource,
      status: 'success',
      duration: msToNs(performance.now() - startTime),
      'upload.filename': staged.value.filename,
      'upload.size': staged.value.size,
    })

    return Result.ok({
      url: `${UploadFileUseCase.PUBLIC_PREFIX}/${staged.value.filename}`,
    })
  }
}
