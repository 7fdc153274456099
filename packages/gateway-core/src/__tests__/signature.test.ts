import { describe, it, expect } from 'vitest'
import { createHmac } from 'node:crypto'
import { createMemoryLogger, silentLogger } from '@atlas/observability'
import { SignatureVerificationError } from '../errors'
import {
  createWebhookVerifier, signBody, verifyBodySignature, verifySharedToken,
} from '../webhooks/signature'

const SECRET = 'test-secret'
const BODY = Buffer.from('{"ref":"refs/heads/main","repository":{"full_name":"acme/backend"}}')

function githubHeader(body: Buffer, secret = SECRET): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`
}

describe('verifyBodySignature', () => {
  it('skips verification when no secret is configured', () => {
    expect(verifyBodySignature(BODY, undefined, '')).toBe('skipped')
    expect(verifyBodySignature(BODY, 'garbage', '')).toBe('skipped')
  })

  it('accepts the HMAC of the exact body', () => {
    expect(verifyBodySignature(BODY, githubHeader(BODY), SECRET)).toBe('verified')
  })

  it('signBody produces the header GitHub sends', () => {
    expect(signBody(BODY, SECRET)).toBe(githubHeader(BODY))
  })

  it('rejects any single-byte body mutation', () => {
    const header = githubHeader(BODY)
    for (let i = 0; i < BODY.length; i++) {
      const mutated = Buffer.from(BODY)
      mutated[i] = mutated[i] ^ 0x01
      expect(() => verifyBodySignature(mutated, header, SECRET)).toThrow(SignatureVerificationError)
    }
  })

  it.each([
    [undefined],
    [''],
    ['sha1=abcdef'],
    [createHmac('sha256', SECRET).update(BODY).digest('hex')],
    ['sha256='],
  ])('rejects header %j when a secret is configured', (header) => {
    expect(() => verifyBodySignature(BODY, header, SECRET)).toThrow(SignatureVerificationError)
  })

  it('rejects a signature made with another secret', () => {
    expect(() => verifyBodySignature(BODY, githubHeader(BODY, 'other-secret'), SECRET)).toThrow(SignatureVerificationError)
  })
})

describe('verifySharedToken', () => {
  it('skips verification when no secret is configured', () => {
    expect(verifySharedToken(undefined, '')).toBe('skipped')
  })

  it('accepts the exact secret', () => {
    expect(verifySharedToken(SECRET, SECRET)).toBe('verified')
  })

  it.each([[undefined], [''], ['test-secre'], ['test-secret '], ['TEST-SECRET']])('rejects %j', (header) => {
    expect(() => verifySharedToken(header, SECRET)).toThrow(SignatureVerificationError)
  })
})

describe('createWebhookVerifier', () => {
  it('dispatches by platform and reads the platform header', () => {
    const verifier = createWebhookVerifier({ githubSecret: SECRET, gitlabSecret: 'gl-secret', logger: silentLogger() })

    expect(verifier.verify('github', { rawBody: BODY, headers: { 'x-hub-signature-256': githubHeader(BODY) } })).toBe('verified')
    expect(verifier.verify('gitlab', { rawBody: BODY, headers: { 'x-gitlab-token': 'gl-secret' } })).toBe('verified')
    expect(() => verifier.verify('gitlab', { rawBody: BODY, headers: { 'x-gitlab-token': SECRET } })).toThrow(SignatureVerificationError)
  })

  it('logs a warning at startup and for every unverified request', () => {
    const { logger, lines } = createMemoryLogger()
    const verifier = createWebhookVerifier({ githubSecret: '', gitlabSecret: SECRET, logger })
    const warnings = () => lines.filter((line) => line.level === 40)

    expect(warnings()).toHaveLength(1)
    expect(warnings()[0].platform).toBe('github')

    expect(verifier.verify('github', { rawBody: BODY, headers: {} })).toBe('skipped')
    expect(warnings()).toHaveLength(2)
    expect(warnings()[1].msg).toBe('[webhooks] Accepting UNVERIFIED webhook: no secret configured')
    expect(warnings()[1].component).toBe('webhook-verifier')
  })
})
