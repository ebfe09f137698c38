import { DatabaseUnavailableError } from '@core/errors/database.error'
import { jsonRequest, makeTestApp } from '../../../__tests__/make-test-app'
import { describe, expect, it } from 'vitest'

const signup = {
  name: 'Ada Example',
  email: 'ada@example.com',
  password: 'test-password',
}

describe('Auth routes', () => {
  it('POST /auth/signup should create the account', async () => {
    const { app, userRepository } = makeTestApp()

    const response = await app.handle(
      jsonRequest('POST', '/auth/signup', signup),
    )

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      id: userRepository.items[0].id.value,
      name: 'Ada Example',
      email: 'ada@example.com',
    })
  })

  it('POST /auth/signup twice should answer 400 and keep one user', async () => {
    const { app, userRepository } = makeTestApp()

    await app.handle(jsonRequest('POST', '/auth/signup', signup))
    const response = await app.handle(
      jsonRequest('POST', '/auth/signup', signup),
    )

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({
      message: 'Email already registered',
    })
    expect(userRepository.items).toHaveLength(1)
  })

  it('POST /auth/signup should answer 422 for an invalid payload', async () => {
    const { app, userRepository } = makeTestApp()

    const response = await app.handle(
      jsonRequest('POST', '/auth/signup', { ...signup, email: 'ada' }),
    )

    expect(response.status).toBe(422)
    expect(await response.json()).toEqual({
      message: 'Validation failed',
      issues: [{ path: 'email', message: 'Invalid email' }],
    })
    expect(userRepository.items).toHaveLength(0)
  })

  it('POST /auth/signup should answer 500 without a database', async () => {
    const { app, userRepository } = makeTestApp()
    userRepository.failWith = DatabaseUnavailableError.create()

    const response = await app.handle(
      jsonRequest('POST', '/auth/signup', signup),
    )

    expect(response.status).toBe(500)
    expect(await response.json()).toEqual({ message: 'Database not available' })
  })

  it('POST /auth/signin should sign in a registered user', async () => {
    const { app } = makeTestApp()
    await app.handle(jsonRequest('POST', '/auth/signup', signup))

    const response = await app.handle(
      jsonRequest('POST', '/auth/signin', {
        email: signup.email,
        password: signup.password,
      }),
    )

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      message: 'signed_in',
      email: 'ada@example.com',
      name: 'Ada Example',
      avatar_url: null,
    })
  })

  it('POST /auth/signin should answer wrong password and unknown email identically', async () => {
    const { app } = makeTestApp()
    await app.handle(jsonRequest('POST', '/auth/signup', signup))

    const wrongPassword = await app.handle(
      jsonRequest('POST', '/auth/signin', {
        email: signup.email,
        password: 'wrong-password',
      }),
    )
    const unknownEmail = await app.handle(
      jsonRequest('POST', '/auth/signin', {
        email: 'nobody@example.com',
        password: signup.password,
      }),
    )

    expect(wrongPassword.status).toBe(401)
    expect(unknownEmail.status).toBe(401)
    expect(await wrongPassword.json()).toEqual({ message: 'Invalid credentials' })
    expect(await unknownEmail.json()).toEqual({ message: 'Invalid credentials' })
  })

  it('POST /auth/signup should treat the email domain case-insensitively', async () => {
    const { app, userRepository } = makeTestApp()

    const first = await app.handle(
      jsonRequest('POST', '/auth/signup', { ...signup, email: 'ada@Example.COM' }),
    )
    const second = await app.handle(
      jsonRequest('POST', '/auth/signup', { ...signup, email: 'ada@example.com' }),
    )

    expect(first.status).toBe(200)
    expect(second.status).toBe(400)
    expect(await second.json()).toEqual({ message: 'Email already registered' })
    expect(userRepository.items).toHaveLength(1)
    expect(userRepository.items[0].email).toBe('ada@example.com')
  })

  it('POST /auth/signin should match a differently cased domain', async () => {
    const { app } = makeTestApp()
    await app.handle(jsonRequest('POST', '/auth/signup', signup))

    const response = await app.handle(
      jsonRequest('POST', '/auth/signin', {
        email: 'ada@EXAMPLE.com',
        password: signup.password,
      }),
    )

    expect(response.status).toBe(200)
  })

  it('POST /auth/signin should answer 401 for an empty password', async () => {
    const { app } = makeTestApp()
    await app.handle(jsonRequest('POST', '/auth/signup', signup))

    const response = await app.handle(
      jsonRequest('POST', '/auth/signin', { email: signup.email, password: '' }),
    )

    expect(response.status).toBe(401)
    expect(await response.json()).toEqual({ message: 'Invalid credentials' })
  })
})
