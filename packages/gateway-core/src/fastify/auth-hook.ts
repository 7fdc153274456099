import type { FastifyRequest } from 'fastify'
import { ATTR_KEYS, SPAN_NAMES, hashForTelemetry, withSpan } from '@atlas/observability'
import type { CredentialResolver } from '../auth/credential-resolver'
import { authorize } from '../auth/rbac'
import { AuthError } from '../errors'
import type { Identity, Role } from '../types'

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name]
  return Array.isArray(value) ? value[0] : value
}

/** Resolves the caller and checks its role; throws AuthError otherwise. */
export async function authenticate(
  request: FastifyRequest,
  resolver: CredentialResolver,
  requiredRole: Role = 'viewer',
): Promise<Identity> {
  return withSpan(SPAN_NAMES.AUTH_VERIFY, { [ATTR_KEYS.AUTH_REQUIRED_ROLE]: requiredRole }, async (span) => {
    const identity = await resolver.resolve(headerValue(request, 'authorization'))
    span.setAttribute(ATTR_KEYS.USER_KEY_HASH, hashForTelemetry(identity.id))
    authorize(identity, requiredRole)
    return identity
  })
}

export function resolveTenantId(request: FastifyRequest): string {
  const tenantId = headerValue(request, 'x-tenant-id')?.trim()
  if (!tenantId) throw new AuthError('missing_tenant')
  return tenantId
}

/** Tenant header when present; webhook senders are not required to set it. */
export function optionalTenantId(request: FastifyRequest): string | null {
  return headerValue(request, 'x-tenant-id')?.trim() || null
}
