import { z } from 'zod'
import type { QueryFn } from '../db/client'
import type { WebhookEvent } from '../types'

/** Append-only log of verified webhook deliveries. */
export interface WebhookEventStore {
  append(event: WebhookEvent): Promise<void>
  /** The `limit` most recent events, oldest first. */
  listRecent(limit: number): Promise<WebhookEvent[]>
}

export class InMemoryWebhookEventStore implements WebhookEventStore {
  private readonly events: WebhookEvent[] = []

  async append(event: WebhookEvent): Promise<void> {
    this.events.push(event)
  }

  async listRecent(limit: number): Promise<WebhookEvent[]> {
    return limit > 0 ? this.events.slice(-limit) : []
  }
}

const eventRowSchema = z.object({
  id: z.string(),
  platform: z.enum(['github', 'gitlab']),
  event_type: z.string(),
  repository: z.string().nullable(),
  ref: z.string().nullable(),
  sender: z.string().nullable(),
  action: z.string().nullable(),
  tenant_id: z.string().nullable(),
  received_at: z.coerce.date(),
})

export class PgWebhookEventStore implements WebhookEventStore {
  constructor(private readonly query: QueryFn) {}

  async append(event: WebhookEvent): Promise<void> {
    await this.query(
      `INSERT INTO webhook_events (id, platform, event_type, repository, ref, sender, action, tenant_id, received_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        event.id, event.platform, event.eventType, event.repository, event.ref,
        event.sender, event.action, event.tenantId, event.receivedAt,
      ],
    )
  }

  async listRecent(limit: number): Promise<WebhookEvent[]> {
    const result = await this.query(
      `SELECT id, platform, event_type, repository, ref, sender, action, tenant_id, received_at
         FROM (SELECT * FROM webhook_events ORDER BY received_at DESC LIMIT $1) recent
        ORDER BY received_at ASC`,
      [limit],
    )
    return result.rows.map((row) => {
      const r = eventRowSchema.parse(row)
      return {
        id: r.id,
        platform: r.platform,
        eventType: r.event_type,
        repository: r.repository ?? '',
        ref: r.ref ?? '',
        sender: r.sender ?? '',
        action: r.action ?? '',
        tenantId: r.tenant_id,
        receivedAt: r.received_at.toISOString(),
      }
    })
  }
}
