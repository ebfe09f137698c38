import { jsonRequest, makeTestApp } from '../../../__tests__/make-test-app'
import { describe, expect, it } from 'vitest'
import { makeVideoJob, validVideoJobPayload } from './factories/video-job.factory'

const UNKNOWN_ID = '65f1a2b3c4d5e6f708192aff'

describe('Video job routes', () => {
  it('POST /video/create then GET /video/:id should return the input', async () => {
    const { app, videoJobRepository } = makeTestApp()

    const created = await app.handle(
      jsonRequest('POST', '/video/create', validVideoJobPayload),
    )
    const id = videoJobRepository.items[0].id.value

    expect(created.status).toBe(200)

    const fetched = await app.handle(jsonRequest('GET', `/video/${id}`))

    expect(fetched.status).toBe(200)
    expect(await fetched.json()).toEqual({
      ...validVideoJobPayload,
      id,
      project_id: null,
      brand_logo_url: null,
      brand_guideline_url: null,
      reference_image_url: null,
      status: 'processing',
      thumbnail_url: null,
      video_url: null,
      notes: null,
      created_at: expect.any(String),
      updated_at: expect.any(String),
    })
  })

  it('POST /video/create should answer id and processing', async () => {
    const { app, videoJobRepository } = makeTestApp()

    const response = await app.handle(
      jsonRequest('POST', '/video/create', validVideoJobPayload),
    )

    expect(await response.json()).toEqual({
      id: videoJobRepository.items[0].id.value,
      status: 'processing',
    })
  })

  it('POST /video/create should answer 422 for an out of range duration', async () => {
    const { app, videoJobRepository } = makeTestApp()

    const response = await app.handle(
      jsonRequest('POST', '/video/create', {
        ...validVideoJobPayload,
        duration_seconds: 121,
      }),
    )

    expect(response.status).toBe(422)
    expect(await response.json()).toEqual({
      message: 'Validation failed',
      issues: [
        {
          path: 'duration_seconds',
          message: 'Number must be less than or equal to 120',
        },
      ],
    })
    expect(videoJobRepository.items).toHaveLength(0)
  })

  it.each(['not-an-id', UNKNOWN_ID])(
    'GET /video/%s should answer 404',
    async (id) => {
      const { app } = makeTestApp()

      const response = await app.handle(jsonRequest('GET', `/video/${id}`))

      expect(response.status).toBe(404)
      expect(await response.json()).toEqual({ message: 'Not found' })
    },
  )

  it('POST /video/:id/finalize twice should leave the job finalized', async () => {
    const { app, videoJobRepository } = makeTestApp()
    const job = makeVideoJob()
    videoJobRepository.items.push(job)

    const first = await app.handle(
      jsonRequest('POST', `/video/${job.id.value}/finalize`),
    )
    const second = await app.handle(
      jsonRequest('POST', `/video/${job.id.value}/finalize`),
    )

    expect(first.status).toBe(200)
    expect(second.status).toBe(200)
    expect(await second.json()).toEqual({
      id: job.id.value,
      status: 'finalized',
    })

    const fetched = await app.handle(
      jsonRequest('GET', `/video/${job.id.value}`),
    )
    expect(await fetched.json()).toMatchObject({ status: 'finalized' })
  })

  it('POST /video/:id/finalize should answer 400 for a malformed id', async () => {
    const { app } = makeTestApp()

    const response = await app.handle(
      jsonRequest('POST', '/video/not-an-id/finalize'),
    )

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({ message: 'Invalid id' })
  })

  it('POST /video/:id/finalize should answer 200 for a well-formed unknown id', async () => {
    const { app } = makeTestApp()

    const response = await app.handle(
      jsonRequest('POST', `/video/${UNKNOWN_ID}/finalize`),
    )

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      id: UNKNOWN_ID,
      status: 'finalized',
    })
  })

  describe('GET /dashboard/summary', () => {
    it('should count and list the owner jobs newest first', async () => {
      const { app, videoJobRepository } = makeTestApp()
      for (let minute = 0; minute < 22; minute++) {
        videoJobRepository.items.push(
          makeVideoJob({
            status: minute < 2 ? 'queued' : 'completed',
            createdAt: new Date(Date.UTC(2024, 4, 1, 10, minute)),
          }),
        )
      }

      const response = await app.handle(
        jsonRequest('GET', '/dashboard/summary?email=ada@example.com'),
      )

      expect(response.status).toBe(200)
      expect(await response.json()).toMatchObject({
        total: 22,
        processing: 2,
        videos: expect.arrayContaining([
          expect.objectContaining({
            created_at: '2024-05-01T10:21:00.000Z',
          }),
        ]),
      })
    })

    it('should cap the list at 20 entries', async () => {
      const { app, videoJobRepository } = makeTestApp()
      for (let minute = 0; minute < 22; minute++) {
        videoJobRepository.items.push(
          makeVideoJob({
            createdAt: new Date(Date.UTC(2024, 4, 1, 10, minute)),
          }),
        )
      }

      const response = await app.handle(
        jsonRequest('GET', '/dashboard/summary?email=ada@example.com'),
      )
      const body: unknown = await response.json()

      expect(body).toMatchObject({
        videos: expect.any(Array),
      })
      expect(body).toHaveProperty('videos.length', 20)
      expect(body).toHaveProperty(
        'videos.0.created_at',
        '2024-05-01T10:21:00.000Z',
      )
      expect(body).toHaveProperty(
        'videos.19.created_at',
        '2024-05-01T10:02:00.000Z',
      )
    })

    it('should find jobs whatever the case of the email domain', async () => {
      const { app } = makeTestApp()
      await app.handle(
        jsonRequest('POST', '/video/create', {
          ...validVideoJobPayload,
          owner_email: 'ada@Example.com',
        }),
      )

      const response = await app.handle(
        jsonRequest('GET', '/dashboard/summary?email=ada@example.COM'),
      )

      expect(response.status).toBe(200)
      expect(await response.json()).toMatchObject({
        total: 1,
        processing: 1,
        videos: [expect.objectContaining({ owner_email: 'ada@example.com' })],
      })
    })

    it('should answer 422 without an email', async () => {
      const { app } = makeTestApp()

      const response = await app.handle(
        jsonRequest('GET', '/dashboard/summary'),
      )

      expect(response.status).toBe(422)
      expect(await response.json()).toEqual({
        message: 'Validation failed',
        issues: [{ path: 'email', message: 'Required' }],
      })
    })
  })
})
