import { z } from 'zod'

/**
 * Environment variables read once at start. Database settings are optional:
 * without them the API still serves and store-backed routes answer
 * "Database not available".
 */
export const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  DATABASE_URL: z
    .string()
    .trim()
    .min(1)
    .optional()
    .refine(
      (url) =>
        url === undefined ||
        url.startsWith('mongodb://') ||
        url.startsWith('mongodb+srv://'),
      { message: "DATABASE_URL must start with 'mongodb://' or 'mongodb+srv://'" },
    ),
  DATABASE_NAME: z.string().trim().min(1).optional(),
  DATABASE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  UPLOAD_DIR: z.string().min(1).default('/tmp/uploads'),
  SERVICE_NAME: z.string().min(1).default('genads-api'),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
})

export type Env = z.infer<typeof EnvSchema>

export type AppConfig = {
  env: Env['NODE_ENV']
  port: number
  serviceName: string
  database: {
    url?: string
    name?: string
    timeoutMs: number
  }
  uploadDir: string
  tracingEnabled: boolean
}

// Unset-but-present variables (`PORT=`) behave like missing ones.
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] =>
      entry[1] !== undefined && entry[1] !== '',
  )
  return Object.fromEntries(entries)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env))

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid environment configuration: ${details}`)
  }

  const values = parsed.data

  return {
    env: values.NODE_ENV,
    port: values.PORT,
    serviceName: values.SERVICE_NAME,
    database: {
      url: values.DATABASE_URL,
      name: values.DATABASE_NAME,
      timeoutMs: values.DATABASE_TIMEOUT_MS,
    },
    uploadDir: values.UPLOAD_DIR,
    tracingEnabled: values.OTEL_EXPORTER_OTLP_ENDPOINT !== undefined,
  }
}
