import { describe, it, expect } from 'vitest'
import { sanitizeErrorForTelemetry, classifyError } from '../sanitize'
import { normalizeEnvironment } from '../conventions'

describe('sanitizeErrorForTelemetry', () => {
  it('masks connection strings in the message', () => {
    const err = new Error('connect failed for postgresql://atlas:test-password@db:5432/atlas_db')
    const safe = sanitizeErrorForTelemetry(err)
    expect(safe.message).toBe('connect failed for postgresql://[REDACTED]')
  })

  it('drops properties attached by drivers', () => {
    const err = Object.assign(new Error('boom'), { body: { secret: 'test-secret' } })
    const safe = sanitizeErrorForTelemetry(err)
    expect(safe.message).toBe('boom')
    expect('body' in safe).toBe(false)
  })

  it('wraps non-errors', () => {
    expect(sanitizeErrorForTelemetry('plain').message).toBe('plain')
  })
})

describe('classifyError', () => {
  it('classifies network failures', () => {
    expect(classifyError(new Error('connect ECONNREFUSED 127.0.0.1:6379'))).toBe('network_error')
  })

  it('looks through a wrapping error to its cause', () => {
    const wrapped = new Error('XREADGROUP failed', { cause: new Error('Connection is closed.') })
    expect(classifyError(wrapped)).toBe('connection_closed')
  })

  it('classifies bad payloads', () => {
    expect(classifyError(new SyntaxError('Unexpected token } in JSON at position 3'))).toBe('payload_error')
  })

  it('falls back for anything else', () => {
    expect(classifyError(new Error('something odd'))).toBe('internal_error')
    expect(classifyError(42)).toBe('unknown_error')
  })
})

describe('normalizeEnvironment', () => {
  it('maps aliases and defaults to production', () => {
    expect(normalizeEnvironment('dev')).toBe('development')
    expect(normalizeEnvironment('preview')).toBe('staging')
    expect(normalizeEnvironment('TEST')).toBe('test')
    expect(normalizeEnvironment(undefined)).toBe('production')
    expect(normalizeEnvironment('qa')).toBe('production')
  })
})
