import { Result } from '@core/domain/result'
import { describe, expect, it } from 'vitest'

describe('Result', () => {
  it('should expose the value of a successful result', () => {
    const result = Result.ok(42)

    expect(result.isSuccess).toBe(true)
    expect(result.isFailure).toBe(false)
    expect(result.value).toBe(42)
  })

  it('should expose the error of a failed result', () => {
    const error = new Error('boom')
    const result = Result.fail(error)

    expect(result.isFailure).toBe(true)
    expect(result.isSuccess).toBe(false)
    expect(result.error).toBe(error)
  })

  it('should throw when reading the value of a failure', () => {
    const result = Result.fail<Error, number>(new Error('boom'))
    expect(() => result.value).toThrow(
      'Cannot read the value of a failed result',
    )
  })

  it('should throw when reading the error of a success', () => {
    const result = Result.ok('done')
    expect(() => result.error).toThrow(
      'Cannot read the error of a successful result',
    )
  })

  describe('map()', () => {
    it('should transform the value of a success', () => {
      expect(Result.ok(2).map((n) => n * 10).value).toBe(20)
    })

    it('should keep the error of a failure', () => {
      const error = new Error('boom')
      const mapped = Result.fail<Error, number>(error).map((n) => n * 10)
      expect(mapped.error).toBe(error)
    })
  })
})
