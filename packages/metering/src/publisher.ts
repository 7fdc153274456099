import type { WebhookPlatform } from '@atlas/gateway-core'
import { SCAN_STREAM, USAGE_STREAM } from './events'
import type { StreamBroker } from './stream-broker'

export type ScanRequest = {
  eventId: string
  platform: WebhookPlatform
  eventType: string
  repository: string
  ref: string
  tenantId?: string | null
}

export type UsageReport = {
  tokensUsed: number
  tenantId?: string | null
  model?: string
  metadata?: Record<string, unknown>
}

type Publisher = Pick<StreamBroker, 'publish'>

/** Queues a scan for a verified webhook event. A missing tenant lands on the default tenant. */
export function publishScanRequest(broker: Publisher, request: ScanRequest): Promise<string> {
  const payload = {
    tenant_id: request.tenantId ?? undefined,
    event_id: request.eventId,
    platform: request.platform,
    event_type: request.eventType,
    repository: request.repository,
    ref: request.ref,
    requested_at: new Date().toISOString(),
  }
  return broker.publish(SCAN_STREAM, { payload: JSON.stringify(payload) })
}

export function publishUsageEvent(broker: Publisher, report: UsageReport): Promise<string> {
  const payload = {
    tenant_id: report.tenantId ?? undefined,
    tokens_used: report.tokensUsed,
    model: report.model,
    metadata: report.metadata,
  }
  return broker.publish(USAGE_STREAM, { payload: JSON.stringify(payload) })
}
