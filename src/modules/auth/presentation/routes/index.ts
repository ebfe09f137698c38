import { BaseElysia } from '@core/libs/elysia'
import type { UserRepository } from '@modules/auth/domain/repositories/user.repository'
import type { PasswordHasher } from '@modules/auth/domain/services/password-hasher'
import { createSignInRoute } from './sign-in.route'
import { createSignUpRoute } from './sign-up.route'

export type AuthDependencies = {
  userRepository: UserRepository
  passwordHasher: PasswordHasher
}

export const createAuthRoutes = (deps: AuthDependencies) =>
  BaseElysia.create({ prefix: '/auth' })
    .use(createSignUpRoute(deps))
    .use(createSignInRoute(deps))
