import { z } from 'zod'
import { AggregationError } from './errors'

export const USAGE_STREAM = 'atlas.ai.usage'
export const SCAN_STREAM = 'atlas.scan.requests'
export const USAGE_STREAMS = [USAGE_STREAM, SCAN_STREAM] as const

export const DEFAULT_CONSUMER_GROUP = 'atlas-api-usage'
export const DEFAULT_CONSUMER_NAME = 'atlas-api-1'
export const DEFAULT_TENANT_ID = 'default'

export type StreamEntry = {
  id: string
  stream: string
  fields: Record<string, string>
}

export type UsageIncrement = {
  tenantId: string
  kind: 'tokens' | 'scans'
  amount: number
}

type Payload = Record<string, unknown>

export type TenantIdRule = {
  source: string
  extract: (payload: Payload) => string | undefined
}

function isRecord(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function idValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return undefined
}

/** Evaluated in order; the first rule that yields an id wins. */
export const TENANT_ID_RULES: readonly TenantIdRule[] = [
  { source: 'payload.tenant_id', extract: (p) => idValue(p.tenant_id) },
  {
    source: 'payload.metadata.tenant_id',
    extract: (p) => (isRecord(p.metadata) ? idValue(p.metadata.tenant_id) : undefined),
  },
]

export function resolveTenantId(payload: Payload, rules: readonly TenantIdRule[] = TENANT_ID_RULES): string {
  for (const rule of rules) {
    const id = rule.extract(payload)
    if (id !== undefined) return id
  }
  return DEFAULT_TENANT_ID
}

const tokensUsedSchema = z.number().int().nonnegative().default(0)

/**
 * Turns a delivered stream entry into the counter increment it stands for.
 * Throws AggregationError for anything that cannot be applied.
 */
export function parseUsageMessage(entry: StreamEntry): UsageIncrement {
  const fail = (message: string, cause?: unknown) =>
    new AggregationError(message, entry.stream, entry.id, cause === undefined ? undefined : { cause })

  if (entry.stream !== USAGE_STREAM && entry.stream !== SCAN_STREAM) {
    throw fail(`Unknown stream ${entry.stream}`)
  }

  let payload: unknown
  try {
    payload = JSON.parse(entry.fields.payload ?? '{}')
  } catch (err) {
    throw fail('Payload is not valid JSON', err)
  }
  if (!isRecord(payload)) throw fail('Payload is not a JSON object')

  const tenantId = resolveTenantId(payload)

  if (entry.stream === SCAN_STREAM) {
    return { tenantId, kind: 'scans', amount: 1 }
  }

  const tokens = tokensUsedSchema.safeParse(payload.tokens_used ?? undefined)
  if (!tokens.success) throw fail('tokens_used must be a non-negative integer', tokens.error)
  return { tenantId, kind: 'tokens', amount: tokens.data }
}
