import { Result } from '@core/domain/result'
import { StagingStorageError } from '@core/errors/storage.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import type {
  StagedFile,
  StagingStorage,
} from '@modules/uploads/domain/services/staging-storage'
import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

/**
 * Writes uploads under one local directory using the name the client sent.
 * Names are not sanitized and an existing file with the same name is
 * replaced.
 */
export class LocalStagingStorage implements StagingStorage {
  constructor(
    private readonly directory: string,
    private readonly logger: AbstractLoggerService,
  ) {}

  async prepare(): Promise<Result<void, StagingStorageError>> {
    try {
      await mkdir(this.directory, { recursive: true })
      return Result.ok(undefined)
    } catch (error) {
      this.logger.error('Could not create staging directory', {
        directory: this.directory,
        error,
      })
      return Result.fail(
        StagingStorageError.create(
          error instanceof Error ? error.message : String(error),
          error,
        ),
      )
    }
  }

  async save(
    filename: string,
    content: Uint8Array,
  ): Promise<Result<StagedFile, StagingStorageError>> {
    const target = path.join(this.directory, filename)

    try {
      await writeFile(target, content)
      return Result.ok({ filename, size: content.byteLength })
    } catch (error) {
      this.logger.error('Could not stage file', { target, error })
      return Result.fail(
        StagingStorageError.create(
          error instanceof Error ? error.message : String(error),
          error,
        ),
      )
    }
  }
}
