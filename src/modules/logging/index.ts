import type { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { PinoLoggerService } from '@core/libs/logging/pino-logger'
import { context } from '@opentelemetry/api'

/**
 * Process-wide root logger; modules derive their own with `withContext`.
 * `LOG_LEVEL=silent` skips the pino call altogether.
 */
export const logger: AbstractLoggerService = new PinoLoggerService(
  { suppressConsole: process.env.LOG_LEVEL === 'silent' },
  context.active(),
)
