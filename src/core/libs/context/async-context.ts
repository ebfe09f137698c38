import { AsyncLocalStorage } from 'node:async_hooks'

export interface CorrelationContext {
  correlationId: string
  traceId?: string
  spanId?: string
}

export interface CorrelationLogBindings {
  trace_id?: string
  span_id?: string
  correlation_id?: string
}

type SpanIds = Pick<CorrelationContext, 'traceId' | 'spanId'>

const storage = new AsyncLocalStorage<CorrelationContext>()

/**
 * Request-scoped ids. The correlation middleware enters a context per
 * request; the logger reads it back through `logBindings`.
 */
export const CorrelationStore = {
  run<T>(context: CorrelationContext, fn: () => T): T {
    return storage.run(context, fn)
  },

  enterWith(context: CorrelationContext): void {
    storage.enterWith(context)
  },

  current(): CorrelationContext | undefined {
    return storage.getStore()
  },

  /** Ids from the active span fill in whatever the request context lacks. */
  logBindings(span?: SpanIds): CorrelationLogBindings {
    const current = storage.getStore()
    return {
      trace_id: current?.traceId ?? span?.traceId,
      span_id: current?.spanId ?? span?.spanId,
      correlation_id: current?.correlationId,
    }
  },

  /** W3C `traceparent` value, sampled flag set. */
  traceparent(context: Required<SpanIds>): string {
    return `00-${context.traceId}-${context.spanId}-01`
  },
}
