import { setTimeout as delay } from 'node:timers/promises'
import { ATTR_KEYS, SPAN_NAMES, classifyError, withSpan } from '@atlas/observability'
import type { Logger } from '@atlas/observability'
import { AggregationError, StreamConnectionError } from './errors'
import {
  DEFAULT_CONSUMER_GROUP, DEFAULT_CONSUMER_NAME, USAGE_STREAMS, parseUsageMessage,
} from './events'
import type { StreamEntry } from './events'
import type { StreamBroker } from './stream-broker'
import type { UsageStore, UsageTransaction } from './usage-store'

export type UsageWorkerOptions = {
  broker: StreamBroker
  store: UsageStore
  logger: Logger
  group?: string
  consumer?: string
  streams?: readonly string[]
  count?: number
  blockMs?: number
  backoffMs?: number
}

function entryKey(entry: StreamEntry): string {
  return `${entry.stream}:${entry.id}`
}

export type BatchResult = {
  read: number
  failed: number
  committed: boolean
}

/**
 * Consumer-group loop that turns usage and scan-request messages into tenant
 * counters.
 *
 * Each batch runs in one transaction. A message that cannot be applied is
 * logged and skipped; the batch commits, then every message in it is
 * acknowledged, whether it was applied or not. Connection failures back off
 * and retry until `stop()`.
 *
 * Before reading new messages (at start, after every connection failure and
 * after any failed acknowledgement) the worker drains its own pending entries,
 * so a batch delivered but never acknowledged is not stranded. Entries whose
 * batch already ran here are acknowledged on sight and never applied twice.
 */
export class UsageWorker {
  private readonly broker: StreamBroker
  private readonly store: UsageStore
  private readonly logger: Logger
  private readonly group: string
  private readonly consumer: string
  private readonly streams: readonly string[]
  private readonly count: number
  private readonly blockMs: number
  private readonly backoffMs: number

  private loop: Promise<void> | null = null
  private stopping = false
  private backoff: AbortController | null = null
  /** Entries this worker has settled but could not acknowledge, by `stream:id`. */
  private readonly unacked = new Set<string>()

  constructor(opts: UsageWorkerOptions) {
    this.broker = opts.broker
    this.store = opts.store
    this.logger = opts.logger.child({ component: 'usage-worker' })
    this.group = opts.group ?? DEFAULT_CONSUMER_GROUP
    this.consumer = opts.consumer ?? DEFAULT_CONSUMER_NAME
    this.streams = opts.streams ?? USAGE_STREAMS
    this.count = opts.count ?? 10
    this.blockMs = opts.blockMs ?? 5000
    this.backoffMs = opts.backoffMs ?? 5000
  }

  get running(): boolean {
    return this.loop !== null
  }

  start(): void {
    if (this.loop) return
    this.stopping = false
    this.logger.info(
      { group: this.group, consumer: this.consumer, streams: this.streams },
      '[usage-worker] Starting',
    )
    this.loop = this.run()
  }

  /** Resolves once the in-flight batch has committed and been acknowledged. */
  async stop(): Promise<void> {
    const loop = this.loop
    if (!loop) return
    this.stopping = true
    this.backoff?.abort()
    await loop
    this.loop = null
    this.logger.info('[usage-worker] Stopped')
  }

  /** Creates the consumer group on every stream. Failures are logged, never thrown. */
  async initialize(): Promise<void> {
    for (const stream of this.streams) {
      try {
        const outcome = await this.broker.ensureGroup(stream, this.group)
        this.logger.debug({ stream, outcome }, '[usage-worker] Consumer group ready')
      } catch (err) {
        this.logger.warn({ err, stream }, '[usage-worker] Failed to create consumer group')
      }
    }
  }

  /**
   * Reads and processes one batch. `cursor` `0` re-reads this consumer's
   * pending entries instead of new ones. Throws StreamConnectionError when the
   * broker is unreachable.
   */
  async runOnce(cursor: '>' | '0' = '>'): Promise<BatchResult> {
    let entries: StreamEntry[]
    try {
      entries = await this.broker.readGroup({
        group: this.group,
        consumer: this.consumer,
        streams: this.streams,
        count: this.count,
        blockMs: this.blockMs,
        cursor,
      })
    } catch (err) {
      throw err instanceof StreamConnectionError ? err : new StreamConnectionError('Stream read failed', { cause: err })
    }
    if (entries.length === 0) return { read: 0, failed: 0, committed: true }

    return withSpan(SPAN_NAMES.USAGE_BATCH, { [ATTR_KEYS.BATCH_SIZE]: entries.length }, async (span) => {
      const result = await this.processBatch(entries)
      span.setAttribute(ATTR_KEYS.BATCH_FAILED, result.failed)
      return result
    })
  }

  private async processBatch(entries: StreamEntry[]): Promise<BatchResult> {
    const fresh = entries.filter((entry) => !this.unacked.has(entryKey(entry)))
    let failed = 0
    let committed = true
    try {
      if (fresh.length > 0) await this.store.batch((tx) => this.applyAll(tx, fresh, () => failed++))
    } catch (err) {
      committed = false
      this.logger.error(
        { err, errorClass: classifyError(err), size: fresh.length },
        '[usage-worker] Batch commit failed; increments dropped',
      )
    } finally {
      await this.ackAll(entries)
    }
    return { read: entries.length, failed, committed }
  }

  private async applyAll(tx: UsageTransaction, entries: StreamEntry[], onFailure: () => void): Promise<void> {
    for (const entry of entries) {
      // Pending entries whose data was trimmed from the stream
      if (Object.keys(entry.fields).length === 0) {
        this.logger.warn(
          { stream: entry.stream, messageId: entry.id },
          `[usage-worker] Skipping ${entry.id}: entry has no data`,
        )
        continue
      }
      try {
        const increment = parseUsageMessage(entry)
        await tx.apply(increment)
        this.logger.info(
          { stream: entry.stream, messageId: entry.id, tenantId: increment.tenantId, [increment.kind]: increment.amount },
          '[usage-worker] Tracked usage',
        )
      } catch (err) {
        onFailure()
        const error = err instanceof AggregationError
          ? err
          : new AggregationError('Failed to apply usage', entry.stream, entry.id, { cause: err })
        this.logger.error(
          { err: error, stream: entry.stream, messageId: entry.id },
          `[usage-worker] Error processing ${entry.id}: ${error.message}`,
        )
      }
    }
  }

  private async ackAll(entries: StreamEntry[]): Promise<void> {
    for (const entry of entries) {
      const key = entryKey(entry)
      try {
        await this.broker.ack(entry.stream, this.group, entry.id)
        this.unacked.delete(key)
      } catch (err) {
        this.unacked.add(key)
        this.logger.warn(
          { err, errorClass: classifyError(err), stream: entry.stream, messageId: entry.id },
          `[usage-worker] Failed to ack ${entry.id}; retrying from the pending list`,
        )
      }
    }
  }

  private async run(): Promise<void> {
    await this.initialize()
    let recovering = true
    while (!this.stopping) {
      try {
        const result = await this.runOnce(recovering ? '0' : '>')
        if (recovering && result.read === 0) {
          // Nothing is pending any more, so nothing is left to acknowledge
          recovering = false
          this.unacked.clear()
        } else if (this.unacked.size > 0) {
          recovering = true
          await this.sleep(this.backoffMs)
        }
      } catch (err) {
        recovering = true
        this.logger.warn(
          { err, errorClass: classifyError(err) },
          `[usage-worker] Stream connection error, retrying in ${this.backoffMs}ms`,
        )
        await this.sleep(this.backoffMs)
      }
    }
  }

  private async sleep(ms: number): Promise<void> {
    if (this.stopping) return
    const controller = new AbortController()
    this.backoff = controller
    try {
      await delay(ms, undefined, { signal: controller.signal })
    } catch (err) {
      if (!controller.signal.aborted) throw err
    } finally {
      this.backoff = null
    }
  }
}
