export type AuthErrorReason =
  | 'missing_credential'
  | 'malformed_credential'
  | 'unsupported_scheme'
  | 'unknown_key'
  | 'malformed_token'
  | 'bad_signature'
  | 'expired'
  | 'insufficient_permissions'
  | 'missing_tenant'

const AUTH_ERROR_MESSAGES: Record<AuthErrorReason, string> = {
  missing_credential: 'Missing authorization header',
  malformed_credential: 'Invalid authorization format',
  unsupported_scheme: 'Unsupported auth scheme',
  unknown_key: 'Invalid API key',
  malformed_token: 'Invalid token format',
  bad_signature: 'Invalid token signature',
  expired: 'Token expired',
  insufficient_permissions: 'Insufficient permissions',
  missing_tenant: 'X-Tenant-Id header is required',
}

/**
 * Authentication or authorization failure. The message is fixed per reason so
 * nothing about the credential or the secret reaches the client.
 */
export class AuthError extends Error {
  readonly reason: AuthErrorReason
  readonly statusCode: 401 | 403

  constructor(reason: AuthErrorReason) {
    super(AUTH_ERROR_MESSAGES[reason])
    this.name = 'AuthError'
    this.reason = reason
    this.statusCode = reason === 'insufficient_permissions' ? 403 : 401
  }
}

export class SignatureVerificationError extends Error {
  readonly reason = 'signature_verification_failed'
  readonly statusCode = 401

  constructor(readonly platform: string) {
    super('Webhook signature verification failed')
    this.name = 'SignatureVerificationError'
  }
}

/** The raw key is already registered under another id. */
export class DuplicateApiKeyError extends Error {
  readonly reason = 'duplicate_api_key'
  readonly statusCode = 409

  constructor() {
    super('API key already registered')
    this.name = 'DuplicateApiKeyError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
