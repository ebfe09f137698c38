import {
  AbstractLoggerService,
  type BaseLogMeta,
  type Config,
  type LogExtra,
  type LogLevel,
} from '@core/libs/logging/abstract-logger'
import { SensitiveDataMasker } from '@core/libs/logging/sensitive-masker'
import { CorrelationStore } from '@core/libs/context/async-context'

import { type Context, trace as otelTrace } from '@opentelemetry/api'
import pino, { type Logger as PinoBaseLogger } from 'pino'

function resolveServiceMeta() {
  return {
    service: process.env.SERVICE_NAME ?? 'genads-api',
    env: process.env.NODE_ENV ?? 'development',
    version: process.env.SERVICE_VERSION ?? '1.0.0',
  }
}

const PINO_LEVELS: Record<LogLevel, pino.Level> = {
  error: 'error',
  warn: 'warn',
  info: 'info',
  debug: 'debug',
  trace: 'trace',
}

export class PinoLoggerService extends AbstractLoggerService<pino.Level> {
  private readonly logger: PinoBaseLogger

  constructor(
    config: Config,
    private readonly otelContext: Context,
    loggerInstance?: PinoBaseLogger,
    context?: string,
  ) {
    super(config, context)

    const serviceMeta = resolveServiceMeta()

    this.logger =
      loggerInstance ??
      pino({
        level: process.env.LOG_LEVEL || 'info',
        serializers: {
          err: pino.stdSerializers.err,
          error: pino.stdSerializers.err,
        },
        base: {
          service: config.serviceName ?? serviceMeta.service,
          env: serviceMeta.env,
          version: serviceMeta.version,
        },
        mixin: () =>
          CorrelationStore.logBindings(
            otelTrace.getSpan(otelContext)?.spanContext(),
          ),
        formatters: {
          log: (obj: Record<string, unknown>) => obj,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        transport: this.resolveTransport(),
      })
  }

  withContext(context: string): PinoLoggerService {
    return new PinoLoggerService(
      this.config,
      this.otelContext,
      this.logger,
      context,
    )
  }

  protected _handle(
    level: LogLevel,
    message: string,
    extra: LogExtra,
    context?: string,
    trace?: string,
  ): void {
    const line: BaseLogMeta = {
      context: context ?? this._context,
      ...SensitiveDataMasker.mask(extra),
    }
    if (trace) line.stack = trace

    this.logger[PINO_LEVELS[level]](line, message)
  }

  log(message: string, ...params: unknown[]) {
    this.emit('info', message, params)
  }

  error(message: string, ...params: unknown[]) {
    this.emit('error', message, params, true)
  }

  warn(message: string, ...params: unknown[]) {
    this.emit('warn', message, params)
  }

  debug(message: string, ...params: unknown[]) {
    this.emit('debug', message, params)
  }

  verbose(message: string, ...params: unknown[]) {
    this.emit('trace', message, params)
  }

  // Only errors carry a trace string through to the line.
  private emit(
    level: LogLevel,
    message: string,
    params: unknown[],
    withTrace = false,
  ) {
    const { extra, context, trace } = this.parseParams(params)
    this.handleLog(level, message, extra, context, withTrace ? trace : undefined)
  }

  // Pretty printing runs in a worker thread, only worth it on a dev terminal.
  private resolveTransport() {
    if (process.env.NODE_ENV === 'development') {
      return {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    }

    return undefined
  }
}
