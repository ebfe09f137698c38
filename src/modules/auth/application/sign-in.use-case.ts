import { Result } from '@core/domain/result'
import { InvalidCredentialsError } from '@core/errors/auth.error'
import type { DatabaseError } from '@core/errors/database.error'
import { ValidationError } from '@core/errors/validation.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { msToNs, toErrorPayload } from '@core/libs/logging/log-event'
import { SignInSchema } from '@modules/auth/application/auth.schemas'
import type { UserRepository } from '@modules/auth/domain/repositories/user.repository'
import type { PasswordHasher } from '@modules/auth/domain/services/password-hasher'

export type SignInUseCaseResult = {
  message: 'signed_in'
  email: string
  name: string
  avatar_url: string | null
}

export type SignInError = ValidationError | InvalidCredentialsError | DatabaseError

export class SignInUseCase {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly passwordHasher: PasswordHasher,
    private readonly logger: AbstractLoggerService,
  ) {}

  async execute(
    payload: unknown,
  ): Promise<Result<SignInUseCaseResult, SignInError>> {
    const startTime = performance.now()
    const resource = 'SignInUseCase'

    const parsed = SignInSchema.safeParse(payload)
    if (!parsed.success) {
      return Result.fail(ValidationError.fromZod(parsed.error))
    }

    const { email, password } = parsed.data

    const found = await this.userRepository.findByEmail(email)
    if (found.isFailure) {
      this.logger.error('Sign in failed', {
        event: 'auth.signin.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
        error: toErrorPayload(found.error),
      })
      return Result.fail(found.error)
    }

    const user = found.value
    if (!user || !this.passwordHasher.verify(password, user.passwordHash)) {
      this.logger.warn('Sign in rejected', {
        event: 'auth.signin.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
      })
      return Result.fail(InvalidCredentialsError.create())
    }

    this.logger.log('Sign in completed', {
      event: 'auth.signin.completed',
      resource,
      status: 'success',
      duration: msToNs(performance.now() - startTime),
      'user.id': user.id.value,
    })

    return Result.ok({
      message: 'signed_in',
      email,
      name: user.name,
      avatar_url: user.avatarUrl ?? null,
    })
  }
}
