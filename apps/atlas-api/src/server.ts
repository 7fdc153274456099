import {
  CredentialResolver, InMemoryApiKeyRegistry, InMemoryWebhookEventStore, PgApiKeyRegistry, PgTenantUsageReader,
  PgWebhookEventStore, applySchema, createDbClient, createWebhookVerifier, generateApiKey, loadConfig,
  seedApiKeys, warnInsecureDefaults,
} from '@atlas/gateway-core'
import type { ApiConfig, ApiKeyRegistry, DbClient, TenantUsageReader } from '@atlas/gateway-core'
import { InMemoryUsageStore, PgUsageStore, RedisStreamBroker, UsageWorker } from '@atlas/metering'
import type { StreamBroker, UsageStore } from '@atlas/metering'
import {
  SERVICE_NAMES, captureError, captureMessage, createLogger, flushSentry, initSentry, initTracing, loggerOptions, shutdownTracing,
} from '@atlas/observability'
import type { Logger } from '@atlas/observability'
import { buildApp } from './app'

async function bootstrapDevKey(registry: ApiKeyRegistry, config: ApiConfig, logger: Logger) {
  if (config.environment !== 'development' || (await registry.list()).length > 0) return
  const rawKey = generateApiKey()
  await registry.register({
    rawKey,
    id: 'key_dev_admin',
    identity: { id: 'dev-admin', username: 'dev-admin', role: 'admin', email: '', metadata: { bootstrap: true } },
  })
  logger.warn(`[auth] No API keys registered; development admin key: ${rawKey}`)
}

function reportDisabledVerification(config: ApiConfig) {
  if (config.environment !== 'production') return
  const secrets = { github: config.githubWebhookSecret, gitlab: config.gitlabWebhookSecret }
  for (const [platform, secret] of Object.entries(secrets)) {
    if (!secret) captureMessage(`Webhook signature verification disabled for ${platform}`, 'warning', { platform })
  }
}

function usageBackends(db: DbClient | undefined): { store: UsageStore; reader: TenantUsageReader } {
  if (db) return { store: new PgUsageStore(db), reader: new PgTenantUsageReader(db.query) }
  const memory = new InMemoryUsageStore()
  return { store: memory, reader: memory }
}

async function main() {
  const config = loadConfig()
  const logger = createLogger({ service: SERVICE_NAMES.API, level: config.logLevel })

  initSentry({ serviceName: SERVICE_NAMES.API, environment: config.environment, logger })
  await initTracing({ serviceName: SERVICE_NAMES.API, environment: config.environment, logger })
  warnInsecureDefaults(config, logger)
  reportDisabledVerification(config)

  const db = createDbClient({ databaseUrl: config.databaseUrl, maxConnections: config.dbPoolMaxSize, logger })
  if (db) {
    await applySchema(db.query)
    logger.info('[db] Schema ready')
  } else {
    logger.warn('[db] Using in-memory stores; data is lost on restart')
  }

  const registry: ApiKeyRegistry = db ? new PgApiKeyRegistry(db.query) : new InMemoryApiKeyRegistry()
  await seedApiKeys(registry, config.seedApiKeys, logger)
  await bootstrapDevKey(registry, config, logger)

  const events = db ? new PgWebhookEventStore(db.query) : new InMemoryWebhookEventStore()
  const usage = usageBackends(db)

  let broker: StreamBroker | null = null
  if (config.redisUrl) {
    broker = RedisStreamBroker.fromUrl(config.redisUrl, logger)
  } else {
    logger.warn('[streams] REDIS_URL not set — usage worker and scan publishing disabled')
  }

  const app = await buildApp({
    logger,
    resolver: new CredentialResolver({ jwtSecret: config.jwtSecret, registry }),
    registry,
    tokens: { secret: config.jwtSecret, ttlSeconds: config.jwtTtlSeconds },
    verifier: createWebhookVerifier({
      githubSecret: config.githubWebhookSecret,
      gitlabSecret: config.gitlabWebhookSecret,
      logger,
    }),
    events,
    usage: usage.reader,
    publisher: broker,
    db,
    httpLogger: loggerOptions({ service: SERVICE_NAMES.API, level: config.logLevel }),
  })

  let worker: UsageWorker | null = null
  if (broker && config.worker.enabled) {
    worker = new UsageWorker({
      broker,
      store: usage.store,
      logger: logger.child({ service: SERVICE_NAMES.USAGE_WORKER }),
      group: config.worker.group,
      consumer: config.worker.consumer,
      count: config.worker.count,
      blockMs: config.worker.blockMs,
      backoffMs: config.worker.backoffMs,
    })
    worker.start()
  }

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info({ signal }, 'Shutting down')
    await app.close()
    // The worker finishes its batch before the connections it writes through close
    await worker?.stop()
    await broker?.close()
    await db?.close()
    await shutdownTracing()
    await flushSentry()
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed')
          process.exit(1)
        },
      )
    })
  }

  await app.listen({ port: config.port, host: config.host })
}

main().catch((err: unknown) => {
  captureError(err, { service: SERVICE_NAMES.API, operation: 'startup' })
  console.error(err)
  process.exit(1)
})
