import type { DatabaseProbe } from '@core/libs/database/datasource'
import { BaseElysia } from '@core/libs/elysia'
import cors from '@elysiajs/cors'
import {
  createAuthRoutes,
  type AuthDependencies,
} from '@modules/auth/presentation/routes'
import { docs } from '@modules/docs'
import { createHealthRoutes } from '@modules/health/presentation/routes'
import { createTelemetry } from '@modules/telemetry'
import {
  createUploadRoutes,
  type UploadDependencies,
} from '@modules/uploads/presentation/routes'
import {
  createVideoJobRoutes,
  type VideoJobDependencies,
} from '@modules/video-jobs/presentation/routes'

export type AppDependencies = AuthDependencies &
  VideoJobDependencies &
  UploadDependencies & {
    database: DatabaseProbe
    telemetry?: { serviceName: string }
  }

export const createApp = (
  deps: AppDependencies,
  options: Parameters<typeof BaseElysia.create>[0] = {},
) => {
  const app = BaseElysia.create(options)

  if (deps.telemetry) {
    app.use(createTelemetry(deps.telemetry.serviceName))
  }

  return app
    .use(docs)
    .use(
      cors({
        origin: true,
        methods: '*',
        allowedHeaders: '*',
        credentials: true,
      }),
    )
    .use(createHealthRoutes(deps.database))
    .use(createAuthRoutes(deps))
    .use(createVideoJobRoutes(deps))
    .use(createUploadRoutes(deps))
}

export type App = ReturnType<typeof createApp>
