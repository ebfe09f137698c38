import { DatabaseUnavailableError } from '@core/errors/database.error'
import { ValidationError } from '@core/errors/validation.error'
import { LoggerStub } from '@core/libs/logging/__tests__/logger.stub'
import { CreateVideoJobUseCase } from '@modules/video-jobs/application/create-video-job.use-case'
import { VideoJobPresenter } from '@modules/video-jobs/application/video-job.presenter'
import { beforeEach, describe, expect, it } from 'vitest'
import { InMemoryVideoJobRepository } from './factories/in-memory-video-job.repository'
import { validVideoJobPayload } from './factories/video-job.factory'

describe('CreateVideoJobUseCase', () => {
  let repository: InMemoryVideoJobRepository
  let useCase: CreateVideoJobUseCase

  beforeEach(() => {
    repository = new InMemoryVideoJobRepository()
    useCase = new CreateVideoJobUseCase(repository, new LoggerStub())
  })

  it('should store the job as processing', async () => {
    const result = await useCase.execute(validVideoJobPayload)

    expect(result.value.status).toBe('processing')
    expect(result.value.id).toMatch(/^[0-9a-f]{24}$/)
    expect(repository.items).toHaveLength(1)

    expect(VideoJobPresenter.toHttp(repository.items[0])).toMatchObject({
      ...validVideoJobPayload,
      id: result.value.id,
      status: 'processing',
      brand_logo_url: null,
      brand_guideline_url: null,
      reference_image_url: null,
      project_id: null,
      thumbnail_url: null,
      video_url: null,
      notes: null,
    })
  })

  it('should apply defaults', async () => {
    const {
      aspect_ratio: _aspectRatio,
      duration_seconds: _duration,
      brand_detail: _brandDetail,
      ...payload
    } = validVideoJobPayload

    const result = await useCase.execute(payload)

    expect(result.isSuccess).toBe(true)
    const job = repository.items[0]
    expect(job.aspectRatio.value).toBe('16:9')
    expect(job.duration.seconds).toBe(15)
    expect(job.brandDetail).toBe('')
  })

  it.each([5, 120])('should accept a duration of %i seconds', async (seconds) => {
    const result = await useCase.execute({
      ...validVideoJobPayload,
      duration_seconds: seconds,
    })

    expect(result.isSuccess).toBe(true)
  })

  it.each([4, 121, 15.5])(
    'should reject a duration of %s seconds',
    async (seconds) => {
      const result = await useCase.execute({
        ...validVideoJobPayload,
        duration_seconds: seconds,
      })

      expect(result.error).toBeInstanceOf(ValidationError)
      expect(result.error).toMatchObject({
        issues: [expect.objectContaining({ path: 'duration_seconds' })],
      })
      expect(repository.items).toHaveLength(0)
    },
  )

  it('should reject a duration sent as text', async () => {
    const result = await useCase.execute({
      ...validVideoJobPayload,
      duration_seconds: '30',
    })

    expect(result.error).toMatchObject({
      issues: [
        {
          path: 'duration_seconds',
          message: 'Expected number, received string',
        },
      ],
    })
  })

  it.each(['1:1', '9:16', '16:9', '4:5', '21:9'])(
    'should accept aspect ratio %s',
    async (ratio) => {
      const result = await useCase.execute({
        ...validVideoJobPayload,
        aspect_ratio: ratio,
      })

      expect(result.isSuccess).toBe(true)
      expect(repository.items[0].aspectRatio.value).toBe(ratio)
    },
  )

  it('should reject an aspect ratio outside the list', async () => {
    const result = await useCase.execute({
      ...validVideoJobPayload,
      aspect_ratio: '3:2',
    })

    expect(result.error).toMatchObject({
      issues: [expect.objectContaining({ path: 'aspect_ratio' })],
    })
    expect(repository.items).toHaveLength(0)
  })

  it('should reject asset urls that are not http(s)', async () => {
    const result = await useCase.execute({
      ...validVideoJobPayload,
      brand_logo_url: 'ftp://files.example.com/logo.svg',
    })

    expect(result.error).toMatchObject({
      issues: [
        { path: 'brand_logo_url', message: 'Expected an http or https URL' },
      ],
    })
  })

  it('should treat null asset urls as absent', async () => {
    const result = await useCase.execute({
      ...validVideoJobPayload,
      reference_image_url: null,
    })

    expect(result.isSuccess).toBe(true)
    expect(repository.items[0].assets.referenceImageUrl).toBeUndefined()
  })

  it('should reject a malformed owner email and missing fields', async () => {
    const { creative_prompt: _prompt, ...payload } = validVideoJobPayload

    const result = await useCase.execute({
      ...payload,
      owner_email: 'ada-at-example.com',
    })

    expect(result.error).toMatchObject({
      issues: [
        { path: 'owner_email', message: 'Invalid email' },
        { path: 'creative_prompt', message: 'Required' },
      ],
    })
  })

  it('should pass store failures through', async () => {
    repository.failWith = DatabaseUnavailableError.create()

    const result = await useCase.execute(validVideoJobPayload)

    expect(result.error).toBeInstanceOf(DatabaseUnavailableError)
  })
})
