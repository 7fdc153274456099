// Types
export { ROLES } from './types'
export type {
  Role, Identity, IdentityInput, ApiKeyRecord, WebhookPlatform, WebhookEvent,
  Tenant, TenantUsage, TenantUsageSummary,
} from './types'

// Errors
export { AuthError, SignatureVerificationError, DuplicateApiKeyError, ConfigError } from './errors'
export type { AuthErrorReason } from './errors'

// Crypto
export { safeEqual, hmacSha256, generateApiKey } from './crypto'

// Auth
export { issueToken, verifyToken, parseRole, systemClock, DEFAULT_TOKEN_TTL_SECONDS } from './auth/token-codec'
export type { Clock, TokenPayload } from './auth/token-codec'
export { hashApiKey, InMemoryApiKeyRegistry, PgApiKeyRegistry } from './auth/api-key-service'
export type { ApiKeyRegistry, RegisterApiKeyInput } from './auth/api-key-service'
export { CredentialResolver } from './auth/credential-resolver'
export type { CredentialResolverOptions } from './auth/credential-resolver'
export { authorize, roleLevel, canRead, canWrite, canManage } from './auth/rbac'
export { PgTenantUsageReader } from './auth/tenant-service'
export type { TenantUsageReader, BillingStatus } from './auth/tenant-service'

// Webhooks
export {
  verifyBodySignature, verifySharedToken, signBody, createWebhookVerifier,
  GITHUB_SIGNATURE_HEADER, GITLAB_TOKEN_HEADER,
} from './webhooks/signature'
export type { VerificationOutcome, WebhookVerifier, WebhookRequest } from './webhooks/signature'
export { parseWebhookEvent, WebhookPayloadError } from './webhooks/payload'
export type { WebhookContext } from './webhooks/payload'
export { InMemoryWebhookEventStore, PgWebhookEventStore } from './webhooks/event-store'
export type { WebhookEventStore } from './webhooks/event-store'

// Config
export { loadConfig, warnInsecureDefaults, DEV_JWT_SECRET } from './config'
export type { ApiConfig } from './config'

// DB
export { createDbClient, createDbClientFromPool } from './db/client'
export type { DbClient, QueryFn, PoolLike, DbClientOptions } from './db/client'
export { applySchema, loadSchemaSql } from './db/schema'

// Fastify helpers
export { authenticate, resolveTenantId, optionalTenantId } from './fastify/auth-hook'
export { registerErrorHandler } from './fastify/error-handler'
export type { UnexpectedErrorHook } from './fastify/error-handler'
export { registerHealthRoute } from './fastify/health-route'
export { seedApiKeys } from './fastify/seed-keys'
