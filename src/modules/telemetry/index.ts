import { opentelemetry } from '@elysiajs/opentelemetry'

/**
 * Request tracing. The exporter is configured by the OpenTelemetry SDK from
 * the standard `OTEL_*` variables, so this is only built when an endpoint
 * is set.
 */
export const createTelemetry = (serviceName: string) =>
  opentelemetry({
    serviceName,
    instrumentations: [],
  })
