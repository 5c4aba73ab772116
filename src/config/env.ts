import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

// Load .env when present; shells and CI supply env vars directly
loadEnv()

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // CLI: write non-ASCII values as UTF16BE:<base64> instead of raw UTF-8
  PDF_INFO_ENCODE_NON_ASCII: BooleanFlag.default('true')
})

export type Env = z.infer<typeof EnvSchema>

// Importing the library must not fail in a host process with its own conventions
const LenientEnvSchema = z.object({
  NODE_ENV: EnvSchema.shape.NODE_ENV.catch('production'),
  LOG_LEVEL: EnvSchema.shape.LOG_LEVEL.catch(undefined),
  PDF_INFO_ENCODE_NON_ASCII: EnvSchema.shape.PDF_INFO_ENCODE_NON_ASCII.catch(true)
})

export const env: Env = LenientEnvSchema.parse(process.env)

export type EnvCheck = { ok: true; value: Env } | { ok: false; error: string }

/** Strict check used by the CLI: unlisted values are reported, not replaced. */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): EnvCheck {
  const result = EnvSchema.safeParse(source)
  if (result.success) {
    return { ok: true, value: result.data }
  }
  const error = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
  return { ok: false, error }
}
