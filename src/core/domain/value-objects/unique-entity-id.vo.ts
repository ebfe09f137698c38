import { BaseValueObject } from '@core/domain/value-objects/base-value-object'
import mongoose from 'mongoose'

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i

/**
 * Identifier shared by every stored record. New ids follow the store's
 * ObjectId scheme (24 hex characters) so they can be used as `_id` as is.
 */
export class UniqueEntityID extends BaseValueObject<string> {
  private constructor(value: string) {
    super(value)
  }

  static create(value?: string): UniqueEntityID {
    return new UniqueEntityID(
      value ?? new mongoose.Types.ObjectId().toHexString(),
    )
  }

  static isValid(value: string): boolean {
    return OBJECT_ID_PATTERN.test(value)
  }

  override toString(): string {
    return this._value
  }
}
