import type { DatabaseProbe } from '@core/libs/database/datasource'
import { BaseElysia } from '@core/libs/elysia'
import { createDiagnosticsRoute } from './diagnostics.route'
import { createHealthRoute } from './health.route'

export const createHealthRoutes = (probe: DatabaseProbe) =>
  BaseElysia.create()
    .use(createHealthRoute(probe))
    .use(createDiagnosticsRoute(probe))
