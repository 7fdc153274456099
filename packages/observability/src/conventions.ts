/**
 * Observability conventions shared by the Atlas control-plane services.
 * Import names from here instead of hardcoding strings.
 */

export const SERVICE_NAMESPACE = 'atlas'

export const SERVICE_NAMES = {
  API: 'atlas-api',
  USAGE_WORKER: 'atlas-usage-worker',
} as const

export const SPAN_NAMES = {
  AUTH_VERIFY: 'auth.verify',
  WEBHOOK_INGEST: 'webhook.ingest',
  SCAN_PUBLISH: 'stream.scan_publish',
  USAGE_BATCH: 'usage.batch',
} as const

export const ATTR_KEYS = {
  // Identity (HASHED via hashForTelemetry)
  TENANT_KEY_HASH: 'atlas.tenant_key_hash',
  USER_KEY_HASH: 'atlas.user_key_hash',
  // Webhooks
  WEBHOOK_PLATFORM: 'atlas.webhook.platform',
  WEBHOOK_EVENT_TYPE: 'atlas.webhook.event_type',
  // Stream consumption
  STREAM_NAME: 'atlas.stream.name',
  BATCH_SIZE: 'atlas.usage.batch_size',
  BATCH_FAILED: 'atlas.usage.batch_failed',
  // Auth
  AUTH_REQUIRED_ROLE: 'atlas.auth.required_role',
} as const

export const SAMPLING_DEFAULTS: Record<string, number> = {
  production: 0.1,
  staging: 1.0,
  development: 1.0,
  test: 0.0,
}

export type AtlasEnvironment = 'production' | 'staging' | 'development' | 'test'

const ENVIRONMENTS: readonly AtlasEnvironment[] = ['production', 'staging', 'development', 'test']

export function normalizeEnvironment(raw: string | undefined): AtlasEnvironment {
  const env = (raw || 'production').toLowerCase()
  if (env === 'prod') return 'production'
  if (env === 'dev') return 'development'
  if (env === 'stage' || env === 'preview') return 'staging'
  return ENVIRONMENTS.find((e) => e === env) ?? 'production'
}

export function getAtlasEnv(): AtlasEnvironment {
  return normalizeEnvironment(process.env.ATLAS_API_ENVIRONMENT || process.env.NODE_ENV)
}
