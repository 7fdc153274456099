import { createHash, createHmac, randomBytes, timingSafeEqual } from 'node:crypto'

export function hmacSha256(secret: string, data: string | Buffer, encoding: 'hex' | 'base64url'): string {
  return createHmac('sha256', secret).update(data).digest(encoding)
}

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex')
}

/**
 * Constant-time string equality. Both sides are hashed first so the comparison
 * never exits early on a length mismatch.
 */
export function safeEqual(a: string, b: string): boolean {
  const left = createHash('sha256').update(a).digest()
  const right = createHash('sha256').update(b).digest()
  return timingSafeEqual(left, right) && a.length === b.length
}

export function generateApiKey(): string {
  return `atlas_${randomBytes(24).toString('hex')}`
}
