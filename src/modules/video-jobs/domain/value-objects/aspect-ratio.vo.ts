import { BaseValueObject } from '@core/domain/value-objects/base-value-object'

export const ASPECT_RATIOS = ['1:1', '9:16', '16:9', '4:5', '21:9'] as const

export type AspectRatio = (typeof ASPECT_RATIOS)[number]

export class AspectRatioVO extends BaseValueObject<AspectRatio> {
  static readonly DEFAULT: AspectRatio = '16:9'

  private constructor(value: AspectRatio) {
    super(value)
  }

  static from(value: AspectRatio): AspectRatioVO {
    return new AspectRatioVO(value)
  }
}
