import type { FastifyInstance, FastifyRequest } from 'fastify'
import { z } from 'zod'
import { authenticate, optionalTenantId, parseWebhookEvent } from '@atlas/gateway-core'
import type { WebhookEvent, WebhookPlatform } from '@atlas/gateway-core'
import { SCAN_STREAM, publishScanRequest } from '@atlas/metering'
import { ATTR_KEYS, SERVICE_NAMES, SPAN_NAMES, captureError, hashForTelemetry, withSpan } from '@atlas/observability'
import type { AppDeps } from '../app'

const PLATFORM_LABEL: Record<WebhookPlatform, string> = { github: 'GitHub', gitlab: 'GitLab' }

const listQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
})

function toResponse(event: WebhookEvent) {
  return {
    id: event.id,
    platform: event.platform,
    event_type: event.eventType,
    repository: event.repository,
    ref: event.ref,
    sender: event.sender,
    action: event.action,
    tenant_id: event.tenantId,
    received_at: event.receivedAt,
  }
}

function githubEventHeader(request: FastifyRequest): string | undefined {
  const value = request.headers['x-github-event']
  return Array.isArray(value) ? value[0] : value
}

export async function registerWebhookRoutes(
  app: FastifyInstance,
  deps: Pick<AppDeps, 'resolver' | 'verifier' | 'events' | 'publisher' | 'logger'>,
) {
  const log = deps.logger.child({ component: 'webhook-routes' })

  const queueScan = async (event: WebhookEvent) => {
    const publisher = deps.publisher
    if (!publisher) return
    try {
      await withSpan(SPAN_NAMES.SCAN_PUBLISH, { [ATTR_KEYS.STREAM_NAME]: SCAN_STREAM }, () =>
        publishScanRequest(publisher, {
          eventId: event.id,
          platform: event.platform,
          eventType: event.eventType,
          repository: event.repository,
          ref: event.ref,
          tenantId: event.tenantId,
        }))
    } catch (err) {
      // The event is already stored; a lost scan request must not fail the delivery
      log.warn({ err, eventId: event.id }, '[webhooks] Failed to queue scan request')
      captureError(err, { service: SERVICE_NAMES.API, operation: 'webhook.queue_scan' })
    }
  }

  // Signatures cover the exact bytes sent, so JSON bodies stay raw in this scope
  await app.register(async (scope) => {
    scope.removeContentTypeParser('application/json')
    scope.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body)
    })

    const ingest = (platform: WebhookPlatform) => async (request: FastifyRequest) => {
      const body = request.body
      const rawBody = Buffer.isBuffer(body) ? body : Buffer.from(typeof body === 'string' ? body : '')
      return withSpan(SPAN_NAMES.WEBHOOK_INGEST, { [ATTR_KEYS.WEBHOOK_PLATFORM]: platform }, async (span) => {
        const verification = deps.verifier.verify(platform, { rawBody, headers: request.headers })
        const event = parseWebhookEvent(platform, rawBody, {
          eventHeader: githubEventHeader(request),
          tenantId: optionalTenantId(request),
        })
        span.setAttribute(ATTR_KEYS.WEBHOOK_EVENT_TYPE, event.eventType)
        if (event.tenantId) span.setAttribute(ATTR_KEYS.TENANT_KEY_HASH, hashForTelemetry(event.tenantId))

        await deps.events.append(event)
        await queueScan(event)

        log.info(
          { eventId: event.id, platform, eventType: event.eventType, repository: event.repository, verification },
          '[webhooks] Event accepted',
        )
        return {
          status: 'accepted',
          message: `${PLATFORM_LABEL[platform]} ${event.eventType} event received for ${event.repository}`,
          event_id: event.id,
        }
      })
    }

    scope.post('/api/v1/webhooks/github', async (request, reply) => reply.code(202).send(await ingest('github')(request)))
    scope.post('/api/v1/webhooks/gitlab', async (request, reply) => reply.code(202).send(await ingest('gitlab')(request)))
  })

  app.get('/api/v1/webhooks/events', async (request) => {
    await authenticate(request, deps.resolver, 'viewer')
    const { limit } = listQuery.parse(request.query)
    const events = await deps.events.listRecent(limit)
    return events.map(toResponse)
  })
}
