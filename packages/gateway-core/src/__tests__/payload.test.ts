import { describe, it, expect } from 'vitest'
import { parseWebhookEvent, WebhookPayloadError } from '../webhooks/payload'

const RECEIVED = new Date('2026-03-01T12:00:00.000Z')

describe('parseWebhookEvent', () => {
  it('maps a GitHub push', () => {
    const body = Buffer.from(JSON.stringify({
      ref: 'refs/heads/main',
      repository: { full_name: 'acme/backend', private: true },
      sender: { login: 'yoad' },
    }))
    const event = parseWebhookEvent('github', body, { eventHeader: 'push', id: 'evt-1', receivedAt: RECEIVED })
    expect(event).toEqual({
      id: 'evt-1',
      platform: 'github',
      eventType: 'push',
      repository: 'acme/backend',
      ref: 'refs/heads/main',
      sender: 'yoad',
      action: '',
      tenantId: null,
      receivedAt: '2026-03-01T12:00:00.000Z',
    })
  })

  it('maps a GitLab push and keeps the tenant', () => {
    const body = Buffer.from(JSON.stringify({
      object_kind: 'push',
      ref: 'refs/heads/main',
      project: { path_with_namespace: 'acme/api' },
      user_name: 'yoad',
    }))
    const event = parseWebhookEvent('gitlab', body, { tenantId: 'acme', id: 'evt-2', receivedAt: RECEIVED })
    expect(event.eventType).toBe('push')
    expect(event.repository).toBe('acme/api')
    expect(event.sender).toBe('yoad')
    expect(event.tenantId).toBe('acme')
  })

  it('fills unknown and empty values when fields are absent', () => {
    const gh = parseWebhookEvent('github', Buffer.from('{}'))
    expect([gh.eventType, gh.repository, gh.ref, gh.sender]).toEqual(['unknown', '', '', ''])
    const gl = parseWebhookEvent('gitlab', Buffer.from('{}'))
    expect(gl.eventType).toBe('unknown')
  })

  it('generates distinct ids', () => {
    const a = parseWebhookEvent('github', Buffer.from('{}'))
    const b = parseWebhookEvent('github', Buffer.from('{}'))
    expect(a.id).not.toBe(b.id)
  })

  it('rejects bodies that are not JSON objects', () => {
    expect(() => parseWebhookEvent('github', Buffer.from('not json'))).toThrow(WebhookPayloadError)
    expect(() => parseWebhookEvent('gitlab', Buffer.from('[1,2]'))).toThrow(WebhookPayloadError)
    expect(() => parseWebhookEvent('github', Buffer.from('{"repository":"acme"}'))).toThrow(WebhookPayloadError)
  })
})
