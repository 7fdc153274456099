/**
 * Compact HS256 tokens: base64url(header).base64url(payload).base64url(signature),
 * no padding. The signature is checked before the payload is decoded so a
 * forged token never reaches the JSON parser.
 */
import { z } from 'zod'
import { hmacSha256, safeEqual } from '../crypto'
import { AuthError } from '../errors'
import { ROLES } from '../types'
import type { Identity, IdentityInput, Role } from '../types'

/** Current time in epoch milliseconds. */
export type Clock = () => number

export const systemClock: Clock = () => Date.now()

export const DEFAULT_TOKEN_TTL_SECONDS = 3600

const HEADER = { alg: 'HS256', typ: 'JWT' } as const

const payloadSchema = z.object({
  sub: z.string(),
  username: z.string(),
  role: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
})

export type TokenPayload = {
  sub: string
  username: string
  role: Role
  iat: number
  exp: number
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url')
}

function sign(signingInput: string, secret: string): string {
  return hmacSha256(secret, signingInput, 'base64url')
}

export function parseRole(value: string | undefined): Role {
  return ROLES.find((role) => role === value) ?? 'viewer'
}

export function issueToken(
  identity: IdentityInput,
  secret: string,
  ttlSeconds: number = DEFAULT_TOKEN_TTL_SECONDS,
  clock: Clock = systemClock,
): string {
  const iat = Math.floor(clock() / 1000)
  const payload: TokenPayload = {
    sub: identity.id,
    username: identity.username,
    role: identity.role ?? 'viewer',
    iat,
    exp: iat + ttlSeconds,
  }
  const signingInput = `${encodeSegment(HEADER)}.${encodeSegment(payload)}`
  return `${signingInput}.${sign(signingInput, secret)}`
}

export function verifyToken(token: string, secret: string, clock: Clock = systemClock): Identity {
  const parts = token.split('.')
  if (parts.length !== 3) throw new AuthError('malformed_token')

  const [headerPart, payloadPart, signaturePart] = parts
  const expected = sign(`${headerPart}.${payloadPart}`, secret)
  if (!safeEqual(signaturePart, expected)) throw new AuthError('bad_signature')

  let decoded: unknown
  try {
    decoded = JSON.parse(Buffer.from(payloadPart, 'base64url').toString('utf8'))
  } catch {
    throw new AuthError('malformed_token')
  }
  const parsed = payloadSchema.safeParse(decoded)
  if (!parsed.success) throw new AuthError('malformed_token')

  const payload = parsed.data
  if ((payload.exp ?? 0) < clock() / 1000) throw new AuthError('expired')

  return {
    id: payload.sub,
    username: payload.username,
    role: parseRole(payload.role),
    email: '',
    metadata: {},
  }
}
