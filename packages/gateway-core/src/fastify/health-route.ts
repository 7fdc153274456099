import type { FastifyInstance } from 'fastify'
import type { DbClient } from '../db/client'

export function registerHealthRoute(app: FastifyInstance, serviceName: string, db?: DbClient) {
  app.get('/health', async () => {
    if (!db) return { status: 'up', database: 'disabled', service: serviceName }
    let database: 'ok' | 'error' = 'ok'
    try {
      await db.query('SELECT 1')
    } catch {
      // Never return the driver's message: it may carry the connection string
      database = 'error'
    }
    return { status: database === 'ok' ? 'up' : 'degraded', database, service: serviceName }
  })
}
