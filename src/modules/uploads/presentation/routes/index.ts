import type { StagingStorage } from '@modules/uploads/domain/services/staging-storage'
import { createUploadRoute } from './upload.route'

export type UploadDependencies = {
  stagingStorage: StagingStorage
}

export const createUploadRoutes = ({ stagingStorage }: UploadDependencies) =>
  createUploadRoute(stagingStorage)
