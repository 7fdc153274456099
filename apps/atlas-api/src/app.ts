import Fastify from 'fastify'
import type { FastifyInstance, FastifyServerOptions } from 'fastify'
import { registerErrorHandler, registerHealthRoute } from '@atlas/gateway-core'
import type {
  ApiKeyRegistry, Clock, CredentialResolver, DbClient, TenantUsageReader, WebhookEventStore, WebhookVerifier,
} from '@atlas/gateway-core'
import type { StreamBroker } from '@atlas/metering'
import { SERVICE_NAMES, captureError } from '@atlas/observability'
import type { Logger } from '@atlas/observability'
import { registerAdminRoutes } from './routes/admin'
import { registerAuthRoutes } from './routes/auth'
import { registerBillingRoutes } from './routes/billing'
import { registerWebhookRoutes } from './routes/webhooks'

export type AppDeps = {
  logger: Logger
  resolver: CredentialResolver
  registry: ApiKeyRegistry
  tokens: { secret: string; ttlSeconds: number; clock?: Clock }
  verifier: WebhookVerifier
  events: WebhookEventStore
  usage: TenantUsageReader
  /** Scan requests are queued here when set. */
  publisher?: Pick<StreamBroker, 'publish'> | null
  db?: DbClient
  /** Fastify request logging; off unless the server passes pino options. */
  httpLogger?: FastifyServerOptions['logger']
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.httpLogger ?? false })

  registerErrorHandler(app, (error, operation) => {
    captureError(error, { service: SERVICE_NAMES.API, operation })
  })

  registerHealthRoute(app, SERVICE_NAMES.API, deps.db)
  await registerAuthRoutes(app, deps)
  await registerWebhookRoutes(app, deps)
  await registerBillingRoutes(app, deps)
  await registerAdminRoutes(app, deps)

  return app
}
