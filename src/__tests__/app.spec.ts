import { Result } from '@core/domain/result'
import { DatabaseExecutionError } from '@core/errors/database.error'
import { describe, expect, it } from 'vitest'
import { jsonRequest, makeTestApp } from './make-test-app'

describe('App', () => {
  it('GET / should answer the liveness message', async () => {
    const { app } = makeTestApp()

    const response = await app.handle(jsonRequest('GET', '/'))

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({ message: 'GenAds Backend Running' })
  })

  describe('GET /health', () => {
    it('should report the ping latency', async () => {
      const { app } = makeTestApp()

      const response = await app.handle(jsonRequest('GET', '/health'))

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        status: 'ok',
        timestamp: expect.any(String),
        database: { latencyMs: 3 },
      })
    })

    it('should answer 503 when the database cannot be pinged', async () => {
      const { app, database } = makeTestApp()
      database.isConnected = false

      const response = await app.handle(jsonRequest('GET', '/health'))

      expect(response.status).toBe(503)
      expect(await response.json()).toEqual({
        status: 'error',
        timestamp: expect.any(String),
      })
    })
  })

  describe('GET /test', () => {
    it('should list up to ten collections when connected', async () => {
      const { app, database } = makeTestApp()
      const names = Array.from({ length: 12 }, (_, index) => `c${index}`)
      database.listCollectionNames.mockResolvedValueOnce(Result.ok(names))

      const response = await app.handle(jsonRequest('GET', '/test'))

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        backend: '✅ Running',
        database: '✅ Connected & Working',
        database_url: '✅ Set',
        database_name: 'genads',
        connection_status: 'Connected',
        collections: names.slice(0, 10),
      })
    })

    it('should still answer 200 without a database', async () => {
      const { app, database } = makeTestApp()
      database.isConnected = false
      database.hasUrl = false
      database.configuredName = undefined

      const response = await app.handle(jsonRequest('GET', '/test'))

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        backend: '✅ Running',
        database: '⚠️ Available but not initialized',
        database_url: '❌ Not Set',
        database_name: '❌ Not Set',
        connection_status: 'Not Connected',
        collections: [],
      })
    })
  })

  it('should allow any origin', async () => {
    const { app } = makeTestApp()

    const response = await app.handle(
      jsonRequest('GET', '/', undefined, { origin: 'https://app.example.com' }),
    )

    expect(response.headers.get('access-control-allow-origin')).toBe(
      'https://app.example.com',
    )
  })

  describe('correlation headers', () => {
    it('should echo the incoming correlation id and trace id', async () => {
      const { app } = makeTestApp()
      const traceId = '4bf92f3577b34da6a3ce929d0e0e4736'

      const response = await app.handle(
        jsonRequest('GET', '/', undefined, {
          'x-correlation-id': 'test-correlation',
          traceparent: `00-${traceId}-00f067aa0ba902b7-01`,
        }),
      )

      expect(response.headers.get('x-correlation-id')).toBe('test-correlation')
      expect(response.headers.get('traceparent')).toMatch(
        new RegExp(`^00-${traceId}-[0-9a-f]{16}-01$`),
      )
    })

    it('should generate ids when none are sent', async () => {
      const { app } = makeTestApp()

      const response = await app.handle(jsonRequest('GET', '/'))

      expect(response.headers.get('x-correlation-id')).toMatch(
        /^[0-9a-f-]{36}$/,
      )
      expect(response.headers.get('traceparent')).toMatch(
        /^00-[0-9a-f]{32}-[0-9a-f]{16}-01$/,
      )
    })
  })

  it('should serve the OpenAPI document', async () => {
    const { app } = makeTestApp()

    const response = await app.handle(jsonRequest('GET', '/docs/json'))

    expect(response.status).toBe(200)
    expect(await response.json()).toMatchObject({
      paths: {
        '/auth/signup': expect.anything(),
        '/video/create': expect.anything(),
        '/upload': expect.anything(),
      },
    })
  })

  it('should hide driver messages behind a generic 500', async () => {
    const { app, videoJobRepository } = makeTestApp()
    videoJobRepository.failWith = DatabaseExecutionError.create(
      'connection pool closed',
    )

    const response = await app.handle(
      jsonRequest('GET', '/dashboard/summary?email=ada@example.com'),
    )

    expect(response.status).toBe(500)
    expect(await response.json()).toEqual({
      message: 'Database operation failed',
    })
  })
})
