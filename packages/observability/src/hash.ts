import { createHash } from 'node:crypto'
import type { Logger } from './logger'

let _salt = ''

export function configureHashSalt(salt: string | undefined, env: string, logger: Logger): void {
  if (salt) {
    _salt = salt
    return
  }
  if (env === 'production') {
    logger.warn('[observability] OTEL_HASH_SALT not set in production - using fallback salt')
  }
  _salt = 'atlas-dev-salt-not-for-production'
}

/** Tenant and user ids go into span attributes only through this. */
export function hashForTelemetry(value: string): string {
  return createHash('sha256').update(`${_salt}:${value}`).digest('hex').slice(0, 32)
}
