import { CorrelationStore } from '@core/libs/context/async-context'
import { context, isSpanContextValid, trace } from '@opentelemetry/api'
import { Elysia } from 'elysia'

export interface RequestTracingContext {
  correlationId: string
  traceId: string
  spanId: string
}

export const CORRELATION_ID_HEADER = 'x-correlation-id'
export const TRACEPARENT_HEADER = 'traceparent'

// version-traceid-parentid-flags, lowercase hex only
const TRACEPARENT_PATTERN = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-[0-9a-f]{2}$/
const ALL_ZEROS = /^0+$/

export function parseTraceparent(
  header: string | null,
): { traceId: string; spanId: string } | null {
  const match = header ? TRACEPARENT_PATTERN.exec(header.trim()) : null
  if (!match) return null

  const [, version, traceId, spanId] = match
  if (version === 'ff' || ALL_ZEROS.test(traceId) || ALL_ZEROS.test(spanId)) {
    return null
  }

  return { traceId, spanId }
}

const randomHex = (length: number) =>
  crypto.randomUUID().replaceAll('-', '').slice(0, length)

/**
 * Ids for one request. An active OpenTelemetry span wins; otherwise the
 * caller's trace is continued under a fresh span id, or a new trace starts.
 */
export function resolveTracingContext(headers: Headers): RequestTracingContext {
  const correlationId = headers.get(CORRELATION_ID_HEADER) || crypto.randomUUID()

  const spanContext = trace.getSpan(context.active())?.spanContext()
  if (spanContext && isSpanContextValid(spanContext)) {
    return {
      correlationId,
      traceId: spanContext.traceId,
      spanId: spanContext.spanId,
    }
  }

  const parent = parseTraceparent(headers.get(TRACEPARENT_HEADER))
  return {
    correlationId,
    traceId: parent?.traceId ?? randomHex(32),
    spanId: randomHex(16),
  }
}

export const correlationMiddleware = new Elysia({ name: 'correlation' })
  .derive({ as: 'global' }, ({ request }) => {
    const tracingContext = resolveTracingContext(request.headers)
    CorrelationStore.enterWith(tracingContext)
    return { tracingContext }
  })
  .onAfterHandle({ as: 'global' }, ({ tracingContext, set }) => {
    set.headers[CORRELATION_ID_HEADER] = tracingContext.correlationId
    set.headers[TRACEPARENT_HEADER] = CorrelationStore.traceparent(tracingContext)
  })
