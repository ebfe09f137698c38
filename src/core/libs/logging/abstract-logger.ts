export type LogExtra = {
  [key: string]: unknown
}

export type Config = {
  suppressConsole?: boolean
  serviceName?: string
}

export type LogLevel = 'info' | 'error' | 'warn' | 'debug' | 'trace'

export type BaseLogMeta = {
  context?: string
  [key: string]: unknown
}

/**
 * Standard attributes attached to request and use case logs so they can be
 * turned into log-based metrics.
 */
export type HttpLogMeta = {
  'trace_id'?: string
  'span_id'?: string
  'correlation_id'?: string

  /** Duration in nanoseconds */
  duration?: number

  'http.method'?: string
  'http.status_code'?: number
  'http.url'?: string
  'http.url_details.path'?: string
  'network.client.ip'?: string

  component?: string
  status?: string
  [key: string]: unknown
}

function isLogExtra(param: unknown): param is LogExtra {
  return typeof param === 'object' && param !== null && !Array.isArray(param)
}

function isString(param: unknown): param is string {
  return typeof param === 'string'
}

export abstract class AbstractLoggerService<TLogLevel = string> {
  protected constructor(
    protected readonly config: Config,
    protected readonly _context?: string,
  ) {}

  get context(): string | undefined {
    return this._context
  }

  abstract withContext(context: string): AbstractLoggerService<TLogLevel>

  abstract log(message: string, ...optionalParams: unknown[]): void
  abstract error(message: string, ...optionalParams: unknown[]): void
  abstract warn(message: string, ...optionalParams: unknown[]): void
  abstract debug(message: string, ...optionalParams: unknown[]): void
  abstract verbose(message: string, ...optionalParams: unknown[]): void

  protected abstract _handle(
    level: LogLevel,
    message: string,
    extra: LogExtra,
    context?: string,
    trace?: string,
  ): void

  protected parseParams(params: unknown[]) {
    const extra = params.find(isLogExtra) ?? {}
    const strings = params.filter(isString)
    const context = this._context ?? strings[0]
    const trace = strings.find((p) => p !== context)

    return { extra, context, trace }
  }

  protected handleLog(
    level: LogLevel,
    message: string,
    extra: LogExtra,
    context?: string,
    trace?: string,
  ): void {
    if (this.config.suppressConsole) return
    this._handle(level, message, extra, context, trace)
  }
}
