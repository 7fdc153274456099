import type { FastifyInstance } from 'fastify'
import { authenticate, resolveTenantId } from '@atlas/gateway-core'
import type { AppDeps } from '../app'

export async function registerBillingRoutes(app: FastifyInstance, deps: Pick<AppDeps, 'resolver' | 'usage'>) {
  app.get('/api/v1/billing/status', async (request) => {
    await authenticate(request, deps.resolver, 'viewer')
    const tenantId = resolveTenantId(request)
    const status = await deps.usage.getBillingStatus(tenantId)
    // Tenants appear on their first usage event; until then they are on the free plan
    if (!status) return { plan_tier: 'free', scans_count: 0, token_count: 0 }
    return { plan_tier: status.planTier, scans_count: status.scansCount, token_count: status.tokenCount }
  })
}
