import { Result } from '@core/domain/result'
import { BaseValueObject } from '@core/domain/value-objects/base-value-object'
import { ValidationError } from '@core/errors/validation.error'

/**
 * Requested ad length in whole seconds.
 */
export class DurationVO extends BaseValueObject<number> {
  static readonly MIN_SECONDS = 5
  static readonly MAX_SECONDS = 120
  static readonly DEFAULT_SECONDS = 15

  private constructor(seconds: number) {
    super(seconds)
  }

  static create(seconds: number): Result<DurationVO, ValidationError> {
    if (!Number.isInteger(seconds)) {
      return Result.fail(
        ValidationError.create([
          { path: 'duration_seconds', message: 'Expected an integer' },
        ]),
      )
    }

    if (seconds < DurationVO.MIN_SECONDS || seconds > DurationVO.MAX_SECONDS) {
      return Result.fail(
        ValidationError.create([
          {
            path: 'duration_seconds',
            message: `Expected a value between ${DurationVO.MIN_SECONDS} and ${DurationVO.MAX_SECONDS}`,
          },
        ]),
      )
    }

    return Result.ok(new DurationVO(seconds))
  }

  static restore(seconds: number): DurationVO {
    return new DurationVO(seconds)
  }

  get seconds(): number {
    return this.value
  }
}
