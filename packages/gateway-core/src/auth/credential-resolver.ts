import { AuthError } from '../errors'
import type { Identity } from '../types'
import type { ApiKeyRegistry } from './api-key-service'
import { systemClock, verifyToken } from './token-codec'
import type { Clock } from './token-codec'

export type CredentialResolverOptions = {
  jwtSecret: string
  registry: ApiKeyRegistry
  clock?: Clock
}

/**
 * Single authentication entry point: `Authorization: Bearer <token>` or
 * `Authorization: ApiKey <key>`, scheme matched case-insensitively.
 */
export class CredentialResolver {
  private readonly jwtSecret: string
  private readonly registry: ApiKeyRegistry
  private readonly clock: Clock

  constructor(options: CredentialResolverOptions) {
    this.jwtSecret = options.jwtSecret
    this.registry = options.registry
    this.clock = options.clock ?? systemClock
  }

  async resolve(authorization: string | undefined): Promise<Identity> {
    if (!authorization) throw new AuthError('missing_credential')

    const space = authorization.indexOf(' ')
    if (space === -1) throw new AuthError('malformed_credential')

    const scheme = authorization.slice(0, space).toLowerCase()
    const credential = authorization.slice(space + 1)

    if (scheme === 'bearer') return verifyToken(credential, this.jwtSecret, this.clock)
    if (scheme === 'apikey') {
      const identity = await this.registry.lookup(credential)
      if (!identity) throw new AuthError('unknown_key')
      return identity
    }
    throw new AuthError('unsupported_scheme')
  }
}
