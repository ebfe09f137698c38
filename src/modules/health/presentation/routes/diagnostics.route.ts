import type { DatabaseProbe } from '@core/libs/database/datasource'
import { BaseElysia } from '@core/libs/elysia'
import { GetDatabaseDiagnosticsUseCase } from '@modules/health/application/get-database-diagnostics.use-case'

export const createDiagnosticsRoute = (probe: DatabaseProbe) =>
  BaseElysia.create().get(
    '/test',
    async ({ logger }) => {
      const useCase = new GetDatabaseDiagnosticsUseCase(probe, logger)
      return useCase.execute()
    },
    {
      detail: {
        tags: ['Health'],
        summary: 'Database diagnostic',
        description:
          'Reports backend and database state. Always answers 200; problems are described in the body.',
      },
    },
  )
