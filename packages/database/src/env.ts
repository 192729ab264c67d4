import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'

/**
 * Validation is skipped under Vitest, in CI, when explicitly requested, and
 * when no DATABASE_URL is present at all (commands that need the database
 * fail later with a clear error from getDb()).
 */
const shouldSkipValidation =
  !!process.env.VITEST ||
  process.env.NODE_ENV === 'test' ||
  !!process.env.CI ||
  !!process.env.SKIP_ENV_VALIDATION ||
  !process.env.DATABASE_URL

export const env = createEnv({
  server: {
    DATABASE_URL: z.string().url().optional(),
    DATABASE_SSL: z.enum(['true', 'false']).default('true'),
  },
  runtimeEnv: process.env,
  skipValidation: shouldSkipValidation,
})
