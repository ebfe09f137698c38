import type { PasswordHasher } from '@modules/auth/domain/services/password-hasher'
import { createHash, timingSafeEqual } from 'node:crypto'

/**
 * Unsalted SHA-256 hex digest, the format existing user records carry.
 */
export class Sha256PasswordHasher implements PasswordHasher {
  hash(password: string): string {
    return createHash('sha256').update(password, 'utf8').digest('hex')
  }

  verify(password: string, passwordHash: string): boolean {
    const expected = Buffer.from(passwordHash, 'utf8')
    const actual = Buffer.from(this.hash(password), 'utf8')
    if (expected.length !== actual.length) return false
    return timingSafeEqual(expected, actual)
  }
}
