type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E }

/**
 * Success-or-failure container returned by use cases and repositories
 * instead of throwing.
 */
export class Result<T, E = Error> {
  private constructor(private readonly outcome: Outcome<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value })
  }

  static fail<E, T = never>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error })
  }

  get isSuccess(): boolean {
    return this.outcome.ok
  }

  get isFailure(): boolean {
    return !this.outcome.ok
  }

  /**
   * @throws Error when read on a failed result
   */
  get value(): T {
    if (!this.outcome.ok) {
      throw new Error('Cannot read the value of a failed result')
    }
    return this.outcome.value
  }

  /**
   * @throws Error when read on a successful result
   */
  get error(): E {
    if (this.outcome.ok) {
      throw new Error('Cannot read the error of a successful result')
    }
    return this.outcome.error
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.outcome.ok
      ? Result.ok<U, E>(fn(this.outcome.value))
      : Result.fail<E, U>(this.outcome.error)
  }
}
