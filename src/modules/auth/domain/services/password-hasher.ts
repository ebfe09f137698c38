export interface PasswordHasher {
  hash(password: string): string
  verify(password: string, passwordHash: string): boolean
}
