import { BaseElysia } from '@core/libs/elysia'
import { SignInUseCase } from '@modules/auth/application/sign-in.use-case'
import type { AuthDependencies } from './index'

export const createSignInRoute = ({
  userRepository,
  passwordHasher,
}: AuthDependencies) =>
  BaseElysia.create().post(
    '/signin',
    async ({ body, logger, set }) => {
      const useCase = new SignInUseCase(userRepository, passwordHasher, logger)

      const result = await useCase.execute(body)
      if (result.isFailure) return BaseElysia.reply(set, result.error)

      return result.value
    },
    {
      detail: {
        tags: ['Auth'],
        summary: 'Sign in',
        description:
          'Body: { email, password }. Unknown email and wrong password both answer 401.',
      },
    },
  )
