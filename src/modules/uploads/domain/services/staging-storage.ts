import { Result } from '@core/domain/result'
import type { StagingStorageError } from '@core/errors/storage.error'

export type StagedFile = {
  filename: string
  size: number
}

export interface StagingStorage {
  save(
    filename: string,
    content: Uint8Array,
  ): Promise<Result<StagedFile, StagingStorageError>>
}
