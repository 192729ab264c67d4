import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'

const shouldSkipValidation =
  !!process.env.VITEST ||
  process.env.NODE_ENV === 'test' ||
  !!process.env.CI ||
  !!process.env.SKIP_ENV_VALIDATION

/**
 * Credentials and endpoints for the collaborators the engine talks to.
 * Every entry is optional so a partially configured deployment still boots;
 * the runtime falls back to the deterministic classifier and responder and
 * refuses to dispatch when the channel is missing.
 */
export const env = createEnv({
  server: {
    AXIOM_TOKEN: z.string().min(1).optional(),
    AXIOM_DATASET: z.string().min(1).optional(),

    CHATWOOT_URL: z.string().url().optional(),
    CHATWOOT_API_TOKEN: z.string().min(1).optional(),
    CHATWOOT_ACCOUNT_ID: z.string().min(1).optional(),
    CHATWOOT_WEBHOOK_SECRET: z.string().min(1).optional(),

    COMMERCE_API_URL: z.string().url().optional(),
    COMMERCE_WEBHOOK_SECRET: z.string().min(1).optional(),

    SLACK_BOT_TOKEN: z.string().min(1).optional(),
    SLACK_APPROVAL_CHANNEL: z.string().min(1).optional(),

    INNGEST_SIGNING_KEY: z.string().min(1).optional(),
    INNGEST_EVENT_KEY: z.string().min(1).optional(),
  },
  runtimeEnv: process.env,
  skipValidation: shouldSkipValidation,
})
