import { z } from 'zod'
import { normalizeEnvironment } from '@atlas/observability'
import type { AtlasEnvironment, Logger } from '@atlas/observability'
import { ConfigError } from './errors'

const PREFIX = 'ATLAS_API_'

/** Development-only signing secret; refused in production. */
export const DEV_JWT_SECRET = 'atlas-dev-secret-change-in-production'

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes')

const envSchema = z.object({
  ENVIRONMENT: z.string().optional().transform(normalizeEnvironment),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),

  DATABASE_URL: z.string().optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().default(5432),
  DB_NAME: z.string().default('atlas_db'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_POOL_MAX_SIZE: z.coerce.number().int().min(1).default(20),

  REDIS_URL: z.string().default(''),

  JWT_SECRET: z.string().default(''),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(3600),

  GITHUB_WEBHOOK_SECRET: z.string().default(''),
  GITLAB_WEBHOOK_SECRET: z.string().default(''),

  WORKER_ENABLED: booleanFlag.default('true'),
  WORKER_GROUP: z.string().default('atlas-api-usage'),
  WORKER_CONSUMER: z.string().default('atlas-api-1'),
  WORKER_BLOCK_MS: z.coerce.number().int().min(0).default(5000),
  WORKER_COUNT: z.coerce.number().int().min(1).default(10),
  WORKER_BACKOFF_MS: z.coerce.number().int().min(0).default(5000),

  SEED_API_KEYS: z.string().default(''),
})

export type ApiConfig = {
  environment: AtlasEnvironment
  logLevel: string
  host: string
  port: number
  /** Empty when neither DATABASE_URL nor DB_PASSWORD is set. */
  databaseUrl: string
  dbPoolMaxSize: number
  redisUrl: string
  jwtSecret: string
  jwtTtlSeconds: number
  usingDevJwtSecret: boolean
  githubWebhookSecret: string
  gitlabWebhookSecret: string
  worker: {
    enabled: boolean
    group: string
    consumer: string
    blockMs: number
    count: number
    backoffMs: number
  }
  seedApiKeys: string
}

function databaseUrlFrom(env: z.infer<typeof envSchema>): string {
  if (env.DATABASE_URL) return env.DATABASE_URL
  if (!env.DB_PASSWORD) return ''
  const user = encodeURIComponent(env.DB_USER)
  const password = encodeURIComponent(env.DB_PASSWORD)
  return `postgresql://${user}:${password}@${env.DB_HOST}:${env.DB_PORT}/${env.DB_NAME}`
}

/**
 * Reads `ATLAS_API_*` variables. Values are validated; names and offending
 * values of secrets never appear in the thrown message.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ApiConfig {
  const raw: Record<string, string | undefined> = {}
  for (const key of Object.keys(envSchema.shape)) {
    raw[key] = source[`${PREFIX}${key}`]
  }

  const parsed = envSchema.safeParse(raw)
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${PREFIX}${issue.path.join('.')}`)
    throw new ConfigError(`Invalid configuration: ${[...new Set(fields)].join(', ')}`)
  }
  const env = parsed.data

  let jwtSecret = env.JWT_SECRET
  const usingDevJwtSecret = !jwtSecret
  if (usingDevJwtSecret) {
    if (env.ENVIRONMENT === 'production') {
      throw new ConfigError(`${PREFIX}JWT_SECRET is required in production`)
    }
    jwtSecret = DEV_JWT_SECRET
  }

  return {
    environment: env.ENVIRONMENT,
    logLevel: env.LOG_LEVEL,
    host: env.HOST,
    port: env.PORT,
    databaseUrl: databaseUrlFrom(env),
    dbPoolMaxSize: env.DB_POOL_MAX_SIZE,
    redisUrl: env.REDIS_URL,
    jwtSecret,
    jwtTtlSeconds: env.JWT_TTL_SECONDS,
    usingDevJwtSecret,
    githubWebhookSecret: env.GITHUB_WEBHOOK_SECRET,
    gitlabWebhookSecret: env.GITLAB_WEBHOOK_SECRET,
    worker: {
      enabled: env.WORKER_ENABLED,
      group: env.WORKER_GROUP,
      consumer: env.WORKER_CONSUMER,
      blockMs: env.WORKER_BLOCK_MS,
      count: env.WORKER_COUNT,
      backoffMs: env.WORKER_BACKOFF_MS,
    },
    seedApiKeys: env.SEED_API_KEYS,
  }
}

export function warnInsecureDefaults(config: ApiConfig, logger: Logger): void {
  if (config.usingDevJwtSecret) {
    logger.warn(`[config] ${PREFIX}JWT_SECRET not set — using the development signing secret (${config.environment})`)
  }
}
