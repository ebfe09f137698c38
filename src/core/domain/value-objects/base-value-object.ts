/**
 * Immutable wrapper around a primitive. Two value objects of the same class
 * are equal when their wrapped values are.
 */
export abstract class BaseValueObject<T extends string | number> {
  protected readonly _value: T

  protected constructor(value: T) {
    this._value = value
  }

  get value(): T {
    return this._value
  }

  equals(other?: BaseValueObject<T>): boolean {
    if (!other) return false
    return other.constructor === this.constructor && other._value === this._value
  }

  toJSON(): T {
    return this._value
  }
}
