/**
 * Spins up the full Fastify app on in-memory stores: no database, no Redis.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { FastifyInstance } from 'fastify'
import {
  CredentialResolver, InMemoryApiKeyRegistry, InMemoryWebhookEventStore, createWebhookVerifier, issueToken, signBody,
} from '@atlas/gateway-core'
import type { Role, WebhookEvent, WebhookEventStore } from '@atlas/gateway-core'
import { InMemoryStreamBroker, InMemoryUsageStore, SCAN_STREAM, UsageWorker } from '@atlas/metering'
import { createMemoryLogger, silentLogger } from '@atlas/observability'
import type { LogLine } from '@atlas/observability'
import { buildApp } from '../app'

const JWT_SECRET = 'test-secret'
const GITHUB_SECRET = 'test-github-secret'
const GITLAB_SECRET = 'test-gitlab-secret'
const NOW = Date.parse('2026-03-01T12:00:00.000Z')
const clock = () => NOW

type Harness = {
  app: FastifyInstance
  registry: InMemoryApiKeyRegistry
  events: InMemoryWebhookEventStore
  usage: InMemoryUsageStore
  broker: InMemoryStreamBroker
  lines: LogLine[]
}

async function harness(options: { webhookSecrets?: boolean; events?: WebhookEventStore } = {}): Promise<Harness> {
  const { logger, lines } = createMemoryLogger()
  const registry = new InMemoryApiKeyRegistry()
  const events = new InMemoryWebhookEventStore()
  const usage = new InMemoryUsageStore()
  const broker = new InMemoryStreamBroker()
  await broker.ensureGroup(SCAN_STREAM, 'atlas-api-usage')
  const secrets = options.webhookSecrets ?? true

  const app = await buildApp({
    logger,
    resolver: new CredentialResolver({ jwtSecret: JWT_SECRET, registry, clock }),
    registry,
    tokens: { secret: JWT_SECRET, ttlSeconds: 3600, clock },
    verifier: createWebhookVerifier({
      githubSecret: secrets ? GITHUB_SECRET : '',
      gitlabSecret: secrets ? GITLAB_SECRET : '',
      logger,
    }),
    events: options.events ?? events,
    usage,
    publisher: broker,
  })
  await app.ready()
  return { app, registry, events, usage, broker, lines }
}

function bearer(role: Role, id = `user-${role}`): string {
  return `Bearer ${issueToken({ id, username: id, role }, JWT_SECRET, 3600, clock)}`
}

const pushBody = JSON.stringify({
  ref: 'refs/heads/main',
  repository: { full_name: 'acme/api' },
  sender: { login: 'octocat' },
})

let h: Harness

beforeEach(async () => {
  h = await harness()
})

afterEach(async () => {
  await h.app.close()
})

describe('GET /health', () => {
  it('reports the database as disabled without one', async () => {
    const res = await h.app.inject({ method: 'GET', url: '/health' })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ status: 'up', database: 'disabled', service: 'atlas-api' })
  })
})

describe('authentication', () => {
  it('rejects a request without credentials', async () => {
    const res = await h.app.inject({ method: 'GET', url: '/api/v1/auth/me' })
    expect(res.statusCode).toBe(401)
    expect(res.json()).toEqual({ error: 'Missing authorization header', reason: 'missing_credential' })
  })

  it.each([
    ['Bearer', 'malformed_credential'],
    ['Basic dXNlcjpwYXNz', 'unsupported_scheme'],
    ['Bearer a.b', 'malformed_token'],
    ['ApiKey nope', 'unknown_key'],
  ])('rejects %s with %s', async (authorization, reason) => {
    const res = await h.app.inject({ method: 'GET', url: '/api/v1/auth/me', headers: { authorization } })
    expect(res.statusCode).toBe(401)
    expect(res.json().reason).toBe(reason)
  })

  it('rejects an expired token', async () => {
    const stale = issueToken({ id: 'u1', username: 'yoad', role: 'admin' }, JWT_SECRET, 60, () => NOW - 120_000)
    const res = await h.app.inject({ method: 'GET', url: '/api/v1/auth/me', headers: { authorization: `Bearer ${stale}` } })
    expect(res.statusCode).toBe(401)
    expect(res.json().reason).toBe('expired')
  })

  it('returns the identity behind a bearer token', async () => {
    const res = await h.app.inject({
      method: 'GET', url: '/api/v1/auth/me', headers: { authorization: bearer('admin', 'u1') },
    })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({
      id: 'u1', username: 'u1', role: 'admin', email: '', metadata: {},
      permissions: { read: true, write: true, manage: true },
    })
  })

  it('accepts the scheme in any case', async () => {
    const token = issueToken({ id: 'u2', username: 'dana', role: 'auditor' }, JWT_SECRET, 3600, clock)
    const res = await h.app.inject({
      method: 'GET', url: '/api/v1/auth/me', headers: { authorization: `bEaReR ${token}` },
    })
    expect(res.json().role).toBe('auditor')
  })

  it('forbids an auditor from admin routes', async () => {
    const res = await h.app.inject({
      method: 'GET', url: '/api/v1/admin/cross-org-stats', headers: { authorization: bearer('auditor') },
    })
    expect(res.statusCode).toBe(403)
    expect(res.json()).toEqual({ error: 'Insufficient permissions', reason: 'insufficient_permissions' })
  })
})

describe('token issuance', () => {
  it('issues a token an admin can hand out', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/auth/tokens',
      headers: { authorization: bearer('admin') },
      payload: { id: 'ci1', username: 'ci-bot', role: 'auditor' },
    })
    expect(res.statusCode).toBe(201)
    const body = res.json()
    expect(body.token_type).toBe('Bearer')
    expect(body.expires_in).toBe(3600)

    const me = await h.app.inject({
      method: 'GET', url: '/api/v1/auth/me', headers: { authorization: `Bearer ${body.token}` },
    })
    expect(me.json()).toMatchObject({ id: 'ci1', username: 'ci-bot', role: 'auditor' })
  })

  it('rejects an invalid body', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/auth/tokens',
      headers: { authorization: bearer('admin') },
      payload: { id: 'ci1', role: 'root' },
    })
    expect(res.statusCode).toBe(400)
    expect(res.json().reason).toBe('validation_failed')
  })

  it('requires admin', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/auth/tokens',
      headers: { authorization: bearer('viewer') },
      payload: { id: 'ci1', username: 'ci-bot' },
    })
    expect(res.statusCode).toBe(403)
  })
})

describe('API keys', () => {
  it('registers, resolves and revokes a key', async () => {
    const created = await h.app.inject({
      method: 'POST',
      url: '/api/v1/auth/api-keys',
      headers: { authorization: bearer('admin', 'ops') },
      payload: { user_id: 'ci1', username: 'ci-bot', role: 'auditor' },
    })
    expect(created.statusCode).toBe(201)
    const { id, key } = created.json()
    expect(key).toMatch(/^atlas_[0-9a-f]{48}$/)

    const me = await h.app.inject({ method: 'GET', url: '/api/v1/auth/me', headers: { authorization: `ApiKey ${key}` } })
    expect(me.json()).toEqual({
      id: 'ci1', username: 'ci-bot', role: 'auditor', email: '', metadata: { created_by: 'ops' },
      permissions: { read: true, write: true, manage: false },
    })

    const revoked = await h.app.inject({
      method: 'DELETE', url: `/api/v1/auth/api-keys/${id}`, headers: { authorization: bearer('admin') },
    })
    expect(revoked.statusCode).toBe(204)

    const after = await h.app.inject({ method: 'GET', url: '/api/v1/auth/me', headers: { authorization: `ApiKey ${key}` } })
    expect(after.json().reason).toBe('unknown_key')

    const again = await h.app.inject({
      method: 'DELETE', url: `/api/v1/auth/api-keys/${id}`, headers: { authorization: bearer('admin') },
    })
    expect(again.statusCode).toBe(404)
  })

  it('keeps a caller-supplied key', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/auth/api-keys',
      headers: { authorization: bearer('admin') },
      payload: { key: 'test-key-0123456789', id: 'key_ci', user_id: 'ci1', username: 'ci-bot' },
    })
    expect(res.json()).toMatchObject({ id: 'key_ci', key: 'test-key-0123456789', role: 'viewer' })
    expect((await h.registry.lookup('test-key-0123456789'))?.username).toBe('ci-bot')
  })

  it('rejects a key that another id already holds', async () => {
    const register = (id: string, role: Role) => h.app.inject({
      method: 'POST',
      url: '/api/v1/auth/api-keys',
      headers: { authorization: bearer('admin') },
      payload: { key: 'test-key-0123456789', id, user_id: id, username: id, role },
    })

    expect((await register('key_ci', 'viewer')).statusCode).toBe(201)
    const dup = await register('key_ops', 'admin')

    expect(dup.statusCode).toBe(409)
    expect(dup.json()).toEqual({ error: 'API key already registered', reason: 'duplicate_api_key' })
    expect((await h.registry.lookup('test-key-0123456789'))?.role).toBe('viewer')
  })
})

describe('GitHub webhooks', () => {
  it('accepts a signed delivery, stores it and queues a scan', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: {
        'content-type': 'application/json',
        'x-github-event': 'push',
        'x-hub-signature-256': signBody(pushBody, GITHUB_SECRET),
        'x-tenant-id': 'acme',
      },
      payload: pushBody,
    })

    expect(res.statusCode).toBe(202)
    const body = res.json()
    expect(body.status).toBe('accepted')
    expect(body.message).toBe('GitHub push event received for acme/api')

    const [event] = await h.events.listRecent(1)
    expect(event).toMatchObject({
      id: body.event_id, platform: 'github', eventType: 'push', repository: 'acme/api',
      ref: 'refs/heads/main', sender: 'octocat', tenantId: 'acme',
    })

    const [queued] = await h.broker.readGroup({
      group: 'atlas-api-usage', consumer: 'c', streams: [SCAN_STREAM], count: 10, blockMs: 0, cursor: '>',
    })
    expect(JSON.parse(queued?.fields.payload ?? '{}')).toMatchObject({ tenant_id: 'acme', event_id: body.event_id })
  })

  it('rejects a bad signature before storing anything', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': 'sha256=deadbeef' },
      payload: pushBody,
    })
    expect(res.statusCode).toBe(401)
    expect(res.json()).toEqual({ error: 'Webhook signature verification failed', reason: 'signature_verification_failed' })
    expect(await h.events.listRecent(20)).toEqual([])
  })

  it('rejects a body changed after signing', async () => {
    const signature = signBody(pushBody, GITHUB_SECRET)
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': signature },
      payload: pushBody.replace('acme/api', 'acme/apj'),
    })
    expect(res.statusCode).toBe(401)
  })

  it('verifies the exact bytes, not re-serialised JSON', async () => {
    const spaced = '{ "ref" : "refs/heads/dev", "repository": { "full_name": "acme/web" } }'
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': signBody(spaced, GITHUB_SECRET) },
      payload: spaced,
    })
    expect(res.statusCode).toBe(202)
    expect(res.json().message).toBe('GitHub unknown event received for acme/web')
  })

  it('rejects a signed body that is not JSON', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': signBody('{oops', GITHUB_SECRET) },
      payload: '{oops',
    })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ error: 'Webhook body is not valid JSON', reason: 'invalid_payload' })
  })
})

describe('GitLab webhooks', () => {
  const gitlabBody = JSON.stringify({
    object_kind: 'push',
    ref: 'refs/heads/main',
    user_name: 'dana',
    project: { path_with_namespace: 'acme/infra' },
  })

  it('accepts the shared token', async () => {
    const res = await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/gitlab',
      headers: { 'content-type': 'application/json', 'x-gitlab-token': GITLAB_SECRET },
      payload: gitlabBody,
    })
    expect(res.statusCode).toBe(202)
    expect(res.json().message).toBe('GitLab push event received for acme/infra')
  })

  it('rejects a wrong or missing token', async () => {
    for (const headers of [{ 'x-gitlab-token': 'test-wrong' }, {}]) {
      const res = await h.app.inject({
        method: 'POST',
        url: '/api/v1/webhooks/gitlab',
        headers: { 'content-type': 'application/json', ...headers },
        payload: gitlabBody,
      })
      expect(res.statusCode).toBe(401)
    }
  })
})

describe('webhooks without secrets', () => {
  it('accepts unsigned deliveries and logs each one', async () => {
    const open = await harness({ webhookSecrets: false })
    const res = await open.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: { 'content-type': 'application/json', 'x-github-event': 'push' },
      payload: pushBody,
    })
    await open.app.close()

    expect(res.statusCode).toBe(202)
    const unverified = open.lines.filter((l) => l.msg === '[webhooks] Accepting UNVERIFIED webhook: no secret configured')
    expect(unverified.map((l) => l.platform)).toEqual(['github'])
  })
})

describe('GET /api/v1/webhooks/events', () => {
  async function deliver(ref: string) {
    const body = JSON.stringify({ ref, repository: { full_name: 'acme/api' } })
    await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: { 'content-type': 'application/json', 'x-github-event': 'push', 'x-hub-signature-256': signBody(body, GITHUB_SECRET) },
      payload: body,
    })
  }

  it('lists the most recent events, oldest first', async () => {
    await deliver('refs/heads/a')
    await deliver('refs/heads/b')
    await deliver('refs/heads/c')

    const res = await h.app.inject({
      method: 'GET', url: '/api/v1/webhooks/events?limit=2', headers: { authorization: bearer('viewer') },
    })
    expect(res.statusCode).toBe(200)
    const events: { ref: string; event_type: string; tenant_id: string | null }[] = res.json()
    expect(events.map((e) => e.ref)).toEqual(['refs/heads/b', 'refs/heads/c'])
    expect(events[0]).toMatchObject({ event_type: 'push', tenant_id: null })
  })

  it('requires a credential', async () => {
    const res = await h.app.inject({ method: 'GET', url: '/api/v1/webhooks/events' })
    expect(res.statusCode).toBe(401)
  })

  it('rejects an out-of-range limit', async () => {
    const res = await h.app.inject({
      method: 'GET', url: '/api/v1/webhooks/events?limit=0', headers: { authorization: bearer('viewer') },
    })
    expect(res.statusCode).toBe(400)
  })
})

describe('billing and usage', () => {
  it('requires the tenant header', async () => {
    const res = await h.app.inject({
      method: 'GET', url: '/api/v1/billing/status', headers: { authorization: bearer('viewer') },
    })
    expect(res.statusCode).toBe(401)
    expect(res.json().reason).toBe('missing_tenant')
  })

  it('reports the free plan for a tenant with no usage yet', async () => {
    const res = await h.app.inject({
      method: 'GET', url: '/api/v1/billing/status', headers: { authorization: bearer('viewer'), 'x-tenant-id': 'ghost' },
    })
    expect(res.json()).toEqual({ plan_tier: 'free', scans_count: 0, token_count: 0 })
  })

  it('counts a scan for each accepted webhook once the worker has run', async () => {
    await h.app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/github',
      headers: {
        'content-type': 'application/json',
        'x-github-event': 'push',
        'x-hub-signature-256': signBody(pushBody, GITHUB_SECRET),
        'x-tenant-id': 'acme',
      },
      payload: pushBody,
    })
    const worker = new UsageWorker({ broker: h.broker, store: h.usage, logger: silentLogger(), blockMs: 0 })
    await worker.initialize()
    await worker.runOnce()

    const status = await h.app.inject({
      method: 'GET', url: '/api/v1/billing/status', headers: { authorization: bearer('viewer'), 'x-tenant-id': 'acme' },
    })
    expect(status.json()).toEqual({ plan_tier: 'free', scans_count: 1, token_count: 0 })

    const stats = await h.app.inject({
      method: 'GET', url: '/api/v1/admin/cross-org-stats', headers: { authorization: bearer('admin') },
    })
    expect(stats.json()).toEqual({ tenants: [{ name: 'acme', plan: 'free', scans: 1, tokens: 0 }] })
  })
})

describe('unexpected failures', () => {
  it('returns a bare 500 without the underlying message', async () => {
    const failing: WebhookEventStore = {
      async append(_event: WebhookEvent) {},
      async listRecent() {
        throw new Error('connect ECONNREFUSED postgres://atlas:test-password@db:5432/atlas')
      },
    }
    const broken = await harness({ events: failing })
    const res = await broken.app.inject({
      method: 'GET', url: '/api/v1/webhooks/events', headers: { authorization: bearer('viewer') },
    })
    await broken.app.close()

    expect(res.statusCode).toBe(500)
    expect(res.json()).toEqual({ error: 'Internal Server Error' })
  })
})
