/**
 * Inbound webhook verification.
 *
 * GitHub signs the raw body: `X-Hub-Signature-256: sha256=<hex hmac>`.
 * GitLab echoes a shared secret: `X-Gitlab-Token: <secret>`.
 *
 * An empty configured secret disables verification for that platform. That is
 * the development bootstrap path, and the verifier logs every request it lets
 * through unchecked.
 */
import type { Logger } from '@atlas/observability'
import { hmacSha256, safeEqual } from '../crypto'
import { SignatureVerificationError } from '../errors'
import type { WebhookPlatform } from '../types'

export const GITHUB_SIGNATURE_HEADER = 'x-hub-signature-256'
export const GITLAB_TOKEN_HEADER = 'x-gitlab-token'

const SIGNATURE_PREFIX = 'sha256='

export type VerificationOutcome = 'verified' | 'skipped'

export function verifyBodySignature(
  body: Buffer | string,
  signatureHeader: string | undefined,
  secret: string,
): VerificationOutcome {
  if (!secret) return 'skipped'
  if (!signatureHeader?.startsWith(SIGNATURE_PREFIX)) {
    throw new SignatureVerificationError('github')
  }
  const expected = hmacSha256(secret, body, 'hex')
  const provided = signatureHeader.slice(SIGNATURE_PREFIX.length)
  if (!safeEqual(provided, expected)) throw new SignatureVerificationError('github')
  return 'verified'
}

export function verifySharedToken(tokenHeader: string | undefined, secret: string): VerificationOutcome {
  if (!secret) return 'skipped'
  if (!tokenHeader || !safeEqual(tokenHeader, secret)) {
    throw new SignatureVerificationError('gitlab')
  }
  return 'verified'
}

export function signBody(body: Buffer | string, secret: string): string {
  return `${SIGNATURE_PREFIX}${hmacSha256(secret, body, 'hex')}`
}

export type WebhookRequest = {
  rawBody: Buffer
  headers: Record<string, string | string[] | undefined>
}

export type WebhookVerifier = {
  verify(platform: WebhookPlatform, request: WebhookRequest): VerificationOutcome
}

function singleHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

export function createWebhookVerifier(options: {
  githubSecret: string
  gitlabSecret: string
  logger: Logger
}): WebhookVerifier {
  const log = options.logger.child({ component: 'webhook-verifier' })
  for (const [platform, secret] of [['github', options.githubSecret], ['gitlab', options.gitlabSecret]]) {
    if (!secret) {
      log.warn({ platform }, `[webhooks] No ${platform} webhook secret configured — signature verification DISABLED`)
    }
  }

  return {
    verify(platform, request) {
      const outcome = platform === 'github'
        ? verifyBodySignature(request.rawBody, singleHeader(request.headers[GITHUB_SIGNATURE_HEADER]), options.githubSecret)
        : verifySharedToken(singleHeader(request.headers[GITLAB_TOKEN_HEADER]), options.gitlabSecret)

      if (outcome === 'skipped') {
        log.warn({ platform }, '[webhooks] Accepting UNVERIFIED webhook: no secret configured')
      }
      return outcome
    },
  }
}
