import { BaseElysia } from '@core/libs/elysia'
import type { VideoJobRepository } from '@modules/video-jobs/domain/repositories/video-job.repository'
import { createCreateVideoJobRoute } from './create-video-job.route'
import { createDashboardRoute } from './dashboard.route'
import { createFinalizeVideoJobRoute } from './finalize-video-job.route'
import { createGetVideoJobRoute } from './get-video-job.route'

export type VideoJobDependencies = {
  videoJobRepository: VideoJobRepository
}

export const createVideoJobRoutes = (deps: VideoJobDependencies) =>
  BaseElysia.create()
    .use(createDashboardRoute(deps))
    .use(
      BaseElysia.create({ prefix: '/video' })
        .use(createCreateVideoJobRoute(deps))
        .use(createGetVideoJobRoute(deps))
        .use(createFinalizeVideoJobRoute(deps)),
    )
