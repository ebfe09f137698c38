import { BaseElysia } from '@core/libs/elysia'
import { SignUpUseCase } from '@modules/auth/application/sign-up.use-case'
import type { AuthDependencies } from './index'

export const createSignUpRoute = ({
  userRepository,
  passwordHasher,
}: AuthDependencies) =>
  BaseElysia.create().post(
    '/signup',
    async ({ body, logger, set }) => {
      const useCase = new SignUpUseCase(userRepository, passwordHasher, logger)

      const result = await useCase.execute(body)
      if (result.isFailure) return BaseElysia.reply(set, result.error)

      return result.value
    },
    {
      detail: {
        tags: ['Auth'],
        summary: 'Create an account',
        description:
          'Body: { name, email, password }. Answers 400 when the email is already registered.',
      },
    },
  )
