import { Sha256PasswordHasher } from '@modules/auth/infra/services/sha256-password-hasher'
import { describe, expect, it } from 'vitest'

describe('Sha256PasswordHasher', () => {
  const hasher = new Sha256PasswordHasher()

  it('should produce the unsalted sha256 hex digest', () => {
    expect(hasher.hash('password')).toBe(
      '5e884898da28047151d0e56f8dc6292773603d0d6aabbdd62a11ef721d1542d8',
    )
  })

  it('should be deterministic', () => {
    expect(hasher.hash('test-password')).toBe(hasher.hash('test-password'))
    expect(hasher.hash('test-password')).toMatch(/^[0-9a-f]{64}$/)
  })

  it('should verify matching passwords only', () => {
    const stored = hasher.hash('test-password')

    expect(hasher.verify('test-password', stored)).toBe(true)
    expect(hasher.verify('Test-password', stored)).toBe(false)
  })

  it('should reject digests of a different length', () => {
    expect(hasher.verify('test-password', 'abc')).toBe(false)
  })
})
