import type { DatabaseProbe } from '@core/libs/database/datasource'
import { BaseElysia } from '@core/libs/elysia'
import { StatusMap } from 'elysia'

export const createHealthRoute = (probe: DatabaseProbe) =>
  BaseElysia.create()
    .get('/', () => ({ message: 'GenAds Backend Running' }), {
      detail: {
        tags: ['Health'],
        summary: 'Liveness check',
      },
    })
    .get(
      '/health',
      async ({ set }) => {
        const database = await probe.ping()
        if (database.isFailure) {
          set.status = StatusMap['Service Unavailable']
          return { status: 'error', timestamp: new Date().toISOString() }
        }
        return {
          status: 'ok',
          timestamp: new Date().toISOString(),
          database: database.value,
        }
      },
      {
        detail: {
          tags: ['Health'],
          summary: 'Readiness check',
          description: 'Pings the database; answers 503 when it is unreachable',
        },
      },
    )
