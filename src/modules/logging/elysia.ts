import type { HttpLogMeta } from '@core/libs/logging/abstract-logger'
import { msToNs, toErrorPayload } from '@core/libs/logging/log-event'
import { Elysia } from 'elysia'
import { logger } from './index'

const requestStartTime = new WeakMap<Request, number>()

function requestMeta(request: Request, path: string, statusCode: number) {
  return {
    'http.method': request.method,
    'http.url': path,
    'http.status_code': statusCode,
    'http.url_details.path': path.split('?')[0],
    'network.client.ip':
      request.headers.get('x-forwarded-for') ??
      request.headers.get('x-real-ip') ??
      undefined,
  } satisfies HttpLogMeta
}

function elapsedMs(request: Request): number {
  const startTime = requestStartTime.get(request)
  return startTime === undefined ? 0 : performance.now() - startTime
}

export const loggerPlugin = new Elysia({ name: 'logger' })
  .derive({ as: 'scoped' }, ({ path, request }) => {
    if (!requestStartTime.has(request)) {
      requestStartTime.set(request, performance.now())
    }

    return {
      logger: logger.withContext(`${request.method} ${path}`),
    }
  })
  .onAfterHandle({ as: 'global' }, ({ request, path, set }) => {
    if (!requestStartTime.has(request)) return

    const durationMs = elapsedMs(request)
    const statusCode = typeof set.status === 'number' ? set.status : 200
    const message = `${request.method} ${path} ${statusCode} ${Math.round(durationMs)}ms`

    const meta: HttpLogMeta = {
      event: 'http.request.completed',
      component: 'HttpServer',
      ...requestMeta(request, path, statusCode),
      duration: msToNs(durationMs),
      status: statusCode >= 400 ? 'failure' : 'success',
    }

    logger.log(message, meta)
  })
  .onError({ as: 'global' }, ({ request, path, set, error }) => {
    const statusCode = typeof set.status === 'number' ? set.status : 500
    const message = `HTTP request failed: ${request.method} ${path} ${statusCode}`

    const meta: HttpLogMeta = {
      event: 'http.request.error',
      component: 'HttpServer',
      ...requestMeta(request, path, statusCode),
      duration: msToNs(elapsedMs(request)),
      status: 'failure',
      error: toErrorPayload(error),
    }

    logger.error(message, meta)
  })
