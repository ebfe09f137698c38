import type { DatabaseProbe } from '@core/libs/database/datasource'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { toErrorPayload } from '@core/libs/logging/log-event'

export type DatabaseDiagnostics = {
  backend: string
  database: string
  database_url: string
  database_name: string
  connection_status: 'Connected' | 'Not Connected'
  collections: string[]
}

const NOT_SET = '❌ Not Set'
const MAX_REASON_LENGTH = 80
const MAX_COLLECTIONS = 10

const clip = (reason: string) => reason.slice(0, MAX_REASON_LENGTH)

/**
 * Builds the `/test` payload. Never fails: every problem is reported inside
 * the payload itself.
 */
export class GetDatabaseDiagnosticsUseCase {
  constructor(
    private readonly probe: DatabaseProbe,
    private readonly logger: AbstractLoggerService,
  ) {}

  async execute(): Promise<DatabaseDiagnostics> {
    const diagnostics: DatabaseDiagnostics = {
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: NOT_SET,
      database_name: NOT_SET,
      connection_status: 'Not Connected',
      collections: [],
    }

    try {
      diagnostics.database_url = this.probe.hasUrl ? '✅ Set' : NOT_SET
      diagnostics.database_name = this.probe.configuredName ?? NOT_SET

      if (!this.probe.isConnected) {
        diagnostics.database = '⚠️ Available but not initialized'
        return diagnostics
      }

      diagnostics.connection_status = 'Connected'

      const listing = await this.probe.listCollectionNames()
      if (listing.isFailure) {
        diagnostics.database = `⚠️ Connected but Error: ${clip(listing.error.message)}`
        return diagnostics
      }

      diagnostics.collections = listing.value.slice(0, MAX_COLLECTIONS)
      diagnostics.database = '✅ Connected & Working'
    } catch (error) {
      this.logger.error('Database diagnostics failed', {
        event: 'health.diagnostics.failed',
        error: toErrorPayload(error),
      })
      diagnostics.database = `❌ Error: ${clip(toErrorPayload(error).message)}`
    }

    return diagnostics
  }
}
