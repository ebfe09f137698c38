import { describe, it, expect } from 'vitest'
import { CorrelationStore, type CorrelationContext } from '../async-context'

describe('CorrelationStore', () => {
  it('should be empty outside of a run', () => {
    expect(CorrelationStore.current()).toBeUndefined()
    expect(CorrelationStore.logBindings()).toEqual({
      trace_id: undefined,
      span_id: undefined,
      correlation_id: undefined,
    })
  })

  it('should expose the request ids as log bindings', () => {
    const context: CorrelationContext = {
      correlationId: 'req-1',
      traceId: 'trace-1',
      spanId: 'span-1',
    }

    const result = CorrelationStore.run(context, () => {
      expect(CorrelationStore.current()).toBe(context)
      expect(CorrelationStore.logBindings()).toEqual({
        trace_id: 'trace-1',
        span_id: 'span-1',
        correlation_id: 'req-1',
      })
      return 'done'
    })

    expect(result).toBe('done')
  })

  it('should fall back to span ids the request context lacks', () => {
    const bindings = CorrelationStore.run({ correlationId: 'req-2' }, () =>
      CorrelationStore.logBindings({ traceId: 'otel-trace', spanId: 'otel-span' }),
    )

    expect(bindings).toEqual({
      trace_id: 'otel-trace',
      span_id: 'otel-span',
      correlation_id: 'req-2',
    })
  })

  it('should format a sampled traceparent', () => {
    expect(
      CorrelationStore.traceparent({
        traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
        spanId: '00f067aa0ba902b7',
      }),
    ).toBe('00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01')
  })

  it('should propagate context through awaits', async () => {
    await CorrelationStore.run({ correlationId: 'req-async' }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 5))
      expect(CorrelationStore.current()?.correlationId).toBe('req-async')
    })
  })

  it('should keep concurrent requests apart', async () => {
    const seen: string[] = []
    const handle = (id: string, delay: number) =>
      CorrelationStore.run({ correlationId: id }, async () => {
        await new Promise((resolve) => setTimeout(resolve, delay))
        seen.push(`${id}:${CorrelationStore.current()?.correlationId}`)
      })

    await Promise.all([handle('slow', 15), handle('fast', 1)])

    expect(seen).toEqual(['fast:fast', 'slow:slow'])
  })
})
