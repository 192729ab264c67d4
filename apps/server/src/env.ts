import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'

export const serverEnv = createEnv({
  server: {
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(3000),
    SLACK_SIGNING_SECRET: z.string().min(1).optional(),
  },
  runtimeEnv: process.env,
  skipValidation: !!process.env.VITEST || !!process.env.SKIP_ENV_VALIDATION,
})
