import { emailSchema } from '@core/libs/validation/email.schema'
import { z } from 'zod'

export const SignUpSchema = z.object({
  name: z.string().trim().min(1),
  email: emailSchema,
  password: z.string(),
})

export const SignInSchema = z.object({
  email: emailSchema,
  password: z.string(),
})
