import { z } from 'zod'

/**
 * A trimmed, valid email address with its domain lowercased. The local part
 * keeps its case, so `Ada@Example.COM` and `Ada@example.com` are one address.
 */
export const emailSchema = z
  .string()
  .trim()
  .email()
  .transform((email) => {
    const at = email.lastIndexOf('@')
    return email.slice(0, at + 1) + email.slice(at + 1).toLowerCase()
  })
