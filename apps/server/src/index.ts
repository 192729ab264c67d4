import { env as coreEnv, getRuntime, initializeAxiom, log } from '@support-triage/core'
import { allWorkflows, inngest } from '@support-triage/core/inngest'
import { serve } from 'inngest/fastify'
import { buildServer } from './app'
import { serverEnv } from './env'

initializeAxiom()

const app = buildServer({
  sendInbound: (payload) => inngest.send(payload),
  approvals: () => getRuntime().approvals,
  chatwootSecrets: coreEnv.CHATWOOT_WEBHOOK_SECRET
    ? [coreEnv.CHATWOOT_WEBHOOK_SECRET]
    : [],
  slackSigningSecret: serverEnv.SLACK_SIGNING_SECRET,
  extend: (root) => {
    root.route({
      method: ['GET', 'POST', 'PUT'],
      url: '/api/inngest',
      handler: serve({ client: inngest, functions: allWorkflows }),
    })
  },
})

app
  .listen({ host: serverEnv.HOST, port: serverEnv.PORT })
  .then((address) =>
    log('info', 'server listening', { address, workflows: allWorkflows.length })
  )
  .catch(async (error: unknown) => {
    await log('error', 'server failed to start', {
      error: error instanceof Error ? error.message : String(error),
    })
    process.exitCode = 1
  })
