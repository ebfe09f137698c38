import 'dotenv/config'

import { loadConfig } from '@core/config/env'
import { DataSource } from '@core/libs/database/datasource'
import { node } from '@elysiajs/node'
import { userCollection } from '@modules/auth/infra/models/user.model'
import { UserRepositoryImpl } from '@modules/auth/infra/repositories/user-repository-impl'
import { Sha256PasswordHasher } from '@modules/auth/infra/services/sha256-password-hasher'
import { logger } from '@modules/logging'
import { projectCollection } from '@modules/projects/infra/models/project.model'
import { LocalStagingStorage } from '@modules/uploads/infra/services/local-staging-storage'
import { videoJobCollection } from '@modules/video-jobs/infra/models/video-job.model'
import { VideoJobRepositoryImpl } from '@modules/video-jobs/infra/repositories/video-job-repository-impl'
import { createApp } from './app'

const config = loadConfig()

const datasource = new DataSource(
  config.database,
  logger.withContext('DataSource'),
  [userCollection, projectCollection, videoJobCollection],
)
const stagingStorage = new LocalStagingStorage(
  config.uploadDir,
  logger.withContext('LocalStagingStorage'),
)

const app = createApp(
  {
    database: datasource,
    userRepository: new UserRepositoryImpl(datasource, logger),
    passwordHasher: new Sha256PasswordHasher(),
    videoJobRepository: new VideoJobRepositoryImpl(datasource, logger),
    stagingStorage,
    telemetry: config.tracingEnabled
      ? { serviceName: config.serviceName }
      : undefined,
  },
  { adapter: node() },
)

const shutdown = async () => {
  logger.log('Shutting down')
  try {
    await app.stop()
  } catch (error) {
    logger.error('Error stopping the server', { error })
  }
  const disconnected = await datasource.disconnect()
  process.exit(disconnected.isSuccess ? 0 : 1)
}

const start = async () => {
  const staging = await stagingStorage.prepare()
  if (staging.isFailure) {
    logger.warn('Uploads will fail until the staging directory exists', {
      directory: config.uploadDir,
    })
  }

  // A missing or unreachable database leaves the API up; store-backed
  // routes answer 500 until it is fixed.
  await datasource.connect()

  app.listen(config.port, () => {
    logger.log(`🦊 Elysia is running on port ${config.port}`, {
      env: config.env,
      databaseConnected: datasource.isConnected,
    })
  })
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

start().catch((error: unknown) => {
  logger.error('Failed to start', { error })
  process.exit(1)
})
