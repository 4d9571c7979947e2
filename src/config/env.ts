import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

// Load .env from the working directory when present; the shell environment wins
loadEnv()

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true')

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  RESUME_FETCH_TIMEOUT_MS: z.coerce.number().positive().int().default(30_000),
  RESUME_FONT_DISCOVERY: booleanFlag
})

export type Env = z.infer<typeof EnvSchema>

export const env: Env = EnvSchema.parse(process.env)
