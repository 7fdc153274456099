import type { FastifyInstance } from 'fastify'
import { authenticate } from '@atlas/gateway-core'
import type { AppDeps } from '../app'

const CROSS_ORG_LIMIT = 50

export async function registerAdminRoutes(app: FastifyInstance, deps: Pick<AppDeps, 'resolver' | 'usage'>) {
  app.get('/api/v1/admin/cross-org-stats', async (request) => {
    await authenticate(request, deps.resolver, 'admin')
    const tenants = await deps.usage.listTopTenants(CROSS_ORG_LIMIT)
    return { tenants }
  })
}
