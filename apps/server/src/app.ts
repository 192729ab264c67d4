import type { IncomingHttpHeaders } from 'node:http'
import {
  type ApprovalService,
  type InboundEvent,
  InvalidTransitionError,
  StoreConflictError,
  log,
} from '@support-triage/core'
import { TRIAGE_INBOUND_RECEIVED } from '@support-triage/core/inngest'
import { parseApprovalAction } from '@support-triage/core/slack'
import {
  type WebhookHeaders,
  parseChatwootWebhook,
  verifyWebhook,
} from '@support-triage/core/webhooks'
import Fastify, { type FastifyInstance } from 'fastify'
import { z } from 'zod'
import { verifySlackSignature } from './lib/verify-slack-signature'

export type SendInboundEvent = (payload: {
  name: typeof TRIAGE_INBOUND_RECEIVED
  data: InboundEvent
  id: string
}) => Promise<unknown>

export interface ServerDeps {
  sendInbound: SendInboundEvent
  /** Resolved per request so the database is only touched when needed */
  approvals: () => ApprovalService
  /** Signature checks are skipped for a channel whose secret is unset */
  chatwootSecrets?: string[]
  slackSigningSecret?: string
  /** Mounts extra routes, such as the Inngest handler, on the root scope */
  extend?: (app: FastifyInstance) => void
  now?: () => Date
}

export const ResolveApprovalBodySchema = z.object({
  outcome: z.enum(['approved', 'rejected']),
  reviewer: z.string().min(1),
  reason: z.string().min(1).nullish(),
})

export function toWebhookHeaders(headers: IncomingHttpHeaders): WebhookHeaders {
  const flat: WebhookHeaders = {}
  for (const [key, value] of Object.entries(headers)) {
    flat[key.toLowerCase()] = Array.isArray(value) ? value[0] : value
  }
  return flat
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) }
  } catch {
    return { ok: false }
  }
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({ logger: false })
  const now = deps.now ?? (() => new Date())

  app.get('/health', async () => ({ status: 'ok' }))

  // Signed webhooks need the exact bytes, so this scope keeps bodies raw
  app.register(async (scope) => {
    scope.addContentTypeParser(
      ['application/json', 'application/x-www-form-urlencoded'],
      { parseAs: 'string' },
      (_request, body, done) => done(null, body)
    )

    scope.post('/webhooks/chatwoot', async (request, reply) => {
      const raw = typeof request.body === 'string' ? request.body : ''
      const secrets = deps.chatwootSecrets ?? []

      if (secrets.length > 0) {
        const result = verifyWebhook(raw, toWebhookHeaders(request.headers), {
          secrets,
          now: () => now().getTime(),
        })
        if (!result.valid) {
          await log('warn', 'chatwoot webhook rejected', {
            route: '/webhooks/chatwoot',
            error: result.error,
          })
          return reply.code(401).send({ error: result.error })
        }
      }

      const json = parseJson(raw)
      if (!json.ok) {
        return reply.code(400).send({ error: 'Body is not valid JSON' })
      }

      const parsed = parseChatwootWebhook(json.value)
      if (parsed.kind === 'ignored') {
        return reply.code(200).send({ status: 'ignored', reason: parsed.reason })
      }

      const { event } = parsed
      // The event id doubles as the Inngest idempotency key for redeliveries
      await deps.sendInbound({
        name: TRIAGE_INBOUND_RECEIVED,
        data: event,
        id: event.eventId,
      })
      await log('info', 'inbound message accepted', {
        route: '/webhooks/chatwoot',
        sessionId: event.sessionId,
        eventId: event.eventId,
      })
      return reply.code(202).send({
        status: 'accepted',
        sessionId: event.sessionId,
        eventId: event.eventId,
      })
    })

    scope.post('/slack/interactions', async (request, reply) => {
      const raw = typeof request.body === 'string' ? request.body : ''
      const secret = deps.slackSigningSecret
      if (!secret) {
        return reply.code(500).send({ error: 'SLACK_SIGNING_SECRET not configured' })
      }

      const headers = toWebhookHeaders(request.headers)
      const valid = verifySlackSignature({
        signature: headers['x-slack-signature'] ?? '',
        timestamp: headers['x-slack-request-timestamp'] ?? '',
        body: raw,
        secret,
        nowSeconds: Math.floor(now().getTime() / 1000),
      })
      if (!valid) {
        return reply.code(401).send({ error: 'Invalid signature' })
      }

      // Slack retries anything but a 200, so malformed payloads are acknowledged
      const payload = new URLSearchParams(raw).get('payload')
      const json = payload ? parseJson(payload) : { ok: false as const }
      const action = json.ok ? parseApprovalAction(json.value) : null
      if (!action) {
        return reply.code(200).send()
      }

      try {
        await deps
          .approvals()
          .decide(action.executionId, action.outcome, action.reviewer)
        return reply.code(200).send()
      } catch (error) {
        if (
          error instanceof InvalidTransitionError ||
          error instanceof StoreConflictError
        ) {
          return reply.code(200).send({
            response_type: 'ephemeral',
            text: `This approval was already handled: ${error.message}`,
          })
        }
        throw error
      }
    })
  })

  app.get('/api/approvals', async () => {
    const pending = await deps.approvals().listPending()
    return {
      approvals: pending.map(({ execution, session, waitingMs }) => ({
        executionId: execution.id,
        sessionId: execution.sessionId,
        cycle: execution.cycle,
        toolName: execution.toolName,
        input: execution.input,
        customerId: session?.customerId ?? null,
        createdAt: execution.createdAt.toISOString(),
        waitingMs,
      })),
    }
  })

  app.post<{ Params: { id: string } }>(
    '/api/approvals/:id',
    async (request, reply) => {
      const body = ResolveApprovalBodySchema.safeParse(request.body)
      if (!body.success) {
        return reply.code(400).send({
          error: 'Invalid body',
          issues: body.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        })
      }

      try {
        const decision = await deps
          .approvals()
          .decide(
            request.params.id,
            body.data.outcome,
            body.data.reviewer,
            body.data.reason ?? null
          )
        return reply.code(202).send(decision)
      } catch (error) {
        if (error instanceof StoreConflictError) {
          return reply.code(404).send({ error: error.message })
        }
        if (error instanceof InvalidTransitionError) {
          return reply.code(409).send({ error: error.message })
        }
        throw error
      }
    }
  )

  deps.extend?.(app)

  return app
}
