import { Result } from '@core/domain/result'
import type { EmailAlreadyRegisteredError } from '@core/errors/auth.error'
import type { DatabaseError } from '@core/errors/database.error'
import { ValidationError } from '@core/errors/validation.error'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { msToNs, toErrorPayload } from '@core/libs/logging/log-event'
import { SignUpSchema } from '@modules/auth/application/auth.schemas'
import { User } from '@modules/auth/domain/entities/user'
import type { UserRepository } from '@modules/auth/domain/repositories/user.repository'
import type { PasswordHasher } from '@modules/auth/domain/services/password-hasher'

export type SignUpUseCaseResult = {
  id: string
  name: string
  email: string
}

export type SignUpError =
  | ValidationError
  | EmailAlreadyRegisteredError
  | DatabaseError

export class SignUpUseCase {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly passwordHasher: PasswordHasher,
    private readonly logger: AbstractLoggerService,
  ) {}

  async execute(
    payload: unknown,
  ): Promise<Result<SignUpUseCaseResult, SignUpError>> {
    const startTime = performance.now()
    const resource = 'SignUpUseCase'

    const parsed = SignUpSchema.safeParse(payload)
    if (!parsed.success) {
      const error = ValidationError.fromZod(parsed.error)
      this.logger.warn('Sign up rejected', {
        event: 'auth.signup.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
        issues: error.issues,
      })
      return Result.fail(error)
    }

    const { name, email, password } = parsed.data
    const user = User.create({
      name,
      email,
      passwordHash: this.passwordHasher.hash(password),
    })

    const created = await this.userRepository.createIfEmailAvailable(user)
    if (created.isFailure) {
      this.logger.error('Sign up failed', {
        event: 'auth.signup.completed',
        resource,
        status: 'failure',
        duration: msToNs(performance.now() - startTime),
        error: toErrorPayload(created.error),
      })
      return Result.fail(created.error)
    }

    this.logger.log('Sign up completed', {
      event: 'auth.signup.completed',
      resource,
      status: 'success',
      duration: msToNs(performance.now() - startTime),
      'user.id': created.value.id.value,
    })

    return Result.ok({
      id: created.value.id.value,
      name: created.value.name,
      email: created.value.email,
    })
  }
}
