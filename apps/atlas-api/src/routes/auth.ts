import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import {
  ROLES, authenticate, canManage, canRead, canWrite, generateApiKey, issueToken,
} from '@atlas/gateway-core'
import type { AppDeps } from '../app'

const identityFields = {
  username: z.string().min(1),
  role: z.enum(ROLES).default('viewer'),
  email: z.string().default(''),
}

const issueTokenBody = z.object({
  id: z.string().min(1),
  ...identityFields,
  ttl_seconds: z.number().int().positive().optional(),
})

const createApiKeyBody = z.object({
  key: z.string().min(16).optional(),
  id: z.string().min(1).optional(),
  user_id: z.string().min(1),
  ...identityFields,
})

const apiKeyParams = z.object({ id: z.string().min(1) })

export async function registerAuthRoutes(
  app: FastifyInstance,
  deps: Pick<AppDeps, 'resolver' | 'registry' | 'tokens' | 'logger'>,
) {
  const log = deps.logger.child({ component: 'auth-routes' })

  app.get('/api/v1/auth/me', async (request) => {
    const identity = await authenticate(request, deps.resolver, 'viewer')
    return {
      id: identity.id,
      username: identity.username,
      role: identity.role,
      email: identity.email,
      metadata: identity.metadata,
      permissions: { read: canRead(identity), write: canWrite(identity), manage: canManage(identity) },
    }
  })

  app.post('/api/v1/auth/tokens', async (request, reply) => {
    const caller = await authenticate(request, deps.resolver, 'admin')
    const body = issueTokenBody.parse(request.body)
    const ttlSeconds = body.ttl_seconds ?? deps.tokens.ttlSeconds
    const token = issueToken(
      { id: body.id, username: body.username, role: body.role, email: body.email },
      deps.tokens.secret,
      ttlSeconds,
      deps.tokens.clock,
    )
    log.info({ issuer: caller.id, subject: body.id, role: body.role }, '[auth] Issued token')
    return reply.code(201).send({ token, token_type: 'Bearer', expires_in: ttlSeconds })
  })

  app.post('/api/v1/auth/api-keys', async (request, reply) => {
    const caller = await authenticate(request, deps.resolver, 'admin')
    const body = createApiKeyBody.parse(request.body)
    const rawKey = body.key ?? generateApiKey()
    const record = await deps.registry.register({
      rawKey,
      id: body.id,
      identity: {
        id: body.user_id,
        username: body.username,
        role: body.role,
        email: body.email,
        metadata: { created_by: caller.id },
      },
    })
    log.info({ issuer: caller.id, keyId: record.id, role: body.role }, '[auth] Registered API key')
    // The raw key is returned once; only its hash is kept
    return reply.code(201).send({
      id: record.id,
      key: rawKey,
      user_id: record.identity.id,
      username: record.identity.username,
      role: record.identity.role,
      created_at: record.createdAt,
    })
  })

  app.delete('/api/v1/auth/api-keys/:id', async (request, reply) => {
    const caller = await authenticate(request, deps.resolver, 'admin')
    const { id } = apiKeyParams.parse(request.params)
    if (!(await deps.registry.revoke(id))) {
      return reply.code(404).send({ error: 'API key not found' })
    }
    log.info({ issuer: caller.id, keyId: id }, '[auth] Revoked API key')
    return reply.code(204).send()
  })
}
