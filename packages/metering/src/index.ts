export { AggregationError, StreamConnectionError } from './errors'

export {
  USAGE_STREAM, SCAN_STREAM, USAGE_STREAMS, DEFAULT_CONSUMER_GROUP, DEFAULT_CONSUMER_NAME,
  DEFAULT_TENANT_ID, TENANT_ID_RULES, resolveTenantId, parseUsageMessage,
} from './events'
export type { StreamEntry, UsageIncrement, TenantIdRule } from './events'

export { RedisStreamBroker, connectRedis, parseReadGroupReply } from './stream-broker'
export type { StreamBroker, ReadGroupOptions, RedisCommander } from './stream-broker'
export { InMemoryStreamBroker } from './memory-broker'

export { PgUsageStore, InMemoryUsageStore, DEFAULT_PLAN_TIER } from './usage-store'
export type { UsageStore, UsageTransaction } from './usage-store'

export { UsageWorker } from './usage-worker'
export type { UsageWorkerOptions, BatchResult } from './usage-worker'

export { publishScanRequest, publishUsageEvent } from './publisher'
export type { ScanRequest, UsageReport } from './publisher'
