import { Redis } from 'ioredis'
import type { RedisOptions } from 'ioredis'
import type { Logger } from '@atlas/observability'
import { StreamConnectionError } from './errors'
import type { StreamEntry } from './events'

export type ReadGroupOptions = {
  group: string
  consumer: string
  streams: readonly string[]
  count: number
  blockMs: number
  /** `>` for never-delivered entries, `0` for this consumer's pending ones. */
  cursor: '>' | '0'
}

/** Consumer-group operations the usage worker and publishers rely on. */
export interface StreamBroker {
  /** Creates the group at the start of the stream, creating the stream too. */
  ensureGroup(stream: string, group: string): Promise<'created' | 'exists'>
  readGroup(options: ReadGroupOptions): Promise<StreamEntry[]>
  ack(stream: string, group: string, id: string): Promise<void>
  publish(stream: string, fields: Record<string, string>): Promise<string>
  close(): Promise<void>
}

/** The slice of an ioredis connection the broker sends commands through. */
export type RedisCommander = {
  call(command: string, ...args: (string | number)[]): Promise<unknown>
  quit(): Promise<unknown>
}

function toEntries(stream: string, raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return []
  const entries: StreamEntry[] = []
  for (const item of raw) {
    if (!Array.isArray(item)) continue
    const id: unknown = item[0]
    const flat: unknown = item[1]
    if (typeof id !== 'string') continue
    const fields: Record<string, string> = {}
    // Pending entries whose data was trimmed away come back with null fields
    if (Array.isArray(flat)) {
      for (let i = 0; i + 1 < flat.length; i += 2) {
        const key: unknown = flat[i]
        const value: unknown = flat[i + 1]
        if (typeof key === 'string' && typeof value === 'string') fields[key] = value
      }
    }
    entries.push({ id, stream, fields })
  }
  return entries
}

/** Flattens an XREADGROUP reply (`null` on timeout) into entries, stream by stream. */
export function parseReadGroupReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) return []
  const entries: StreamEntry[] = []
  for (const streamReply of reply) {
    if (!Array.isArray(streamReply)) continue
    const stream: unknown = streamReply[0]
    if (typeof stream === 'string') entries.push(...toEntries(stream, streamReply[1]))
  }
  return entries
}

/**
 * Opens the reader and writer connections. Connection errors are logged here;
 * commands that fail surface as StreamConnectionError from the broker.
 */
export function connectRedis(
  url: string,
  logger: Logger,
  options: RedisOptions = {},
): { reader: Redis; writer: Redis } {
  const log = logger.child({ component: 'redis' })
  const reader = new Redis(url, { maxRetriesPerRequest: 1, ...options })
  const writer = reader.duplicate()
  for (const [connection, client] of [['reader', reader], ['writer', writer]] as const) {
    client.on('error', (err: Error) => log.warn({ err, connection }, '[redis] Connection error'))
  }
  return { reader, writer }
}

/**
 * Redis Streams broker. Blocking reads hold their connection for up to
 * `blockMs`, so publishing goes through a second connection.
 */
export class RedisStreamBroker implements StreamBroker {
  constructor(
    private readonly reader: RedisCommander,
    private readonly writer: RedisCommander = reader,
  ) {}

  static fromUrl(url: string, logger: Logger): RedisStreamBroker {
    const { reader, writer } = connectRedis(url, logger)
    return new RedisStreamBroker(reader, writer)
  }

  async ensureGroup(stream: string, group: string): Promise<'created' | 'exists'> {
    try {
      await this.reader.call('XGROUP', 'CREATE', stream, group, '0', 'MKSTREAM')
      return 'created'
    } catch (err) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) return 'exists'
      throw err
    }
  }

  async readGroup(options: ReadGroupOptions): Promise<StreamEntry[]> {
    const args: (string | number)[] = [
      'GROUP', options.group, options.consumer,
      'COUNT', options.count,
      'BLOCK', options.blockMs,
      'STREAMS', ...options.streams, ...options.streams.map(() => options.cursor),
    ]
    let reply: unknown
    try {
      reply = await this.reader.call('XREADGROUP', ...args)
    } catch (err) {
      throw new StreamConnectionError('XREADGROUP failed', { cause: err })
    }
    return parseReadGroupReply(reply)
  }

  async ack(stream: string, group: string, id: string): Promise<void> {
    try {
      await this.reader.call('XACK', stream, group, id)
    } catch (err) {
      throw new StreamConnectionError(`XACK ${stream} ${id} failed`, { cause: err })
    }
  }

  async publish(stream: string, fields: Record<string, string>): Promise<string> {
    const flat = Object.entries(fields).flat()
    let reply: unknown
    try {
      reply = await this.writer.call('XADD', stream, '*', ...flat)
    } catch (err) {
      throw new StreamConnectionError(`XADD ${stream} failed`, { cause: err })
    }
    if (typeof reply !== 'string') throw new StreamConnectionError(`XADD ${stream} returned no id`)
    return reply
  }

  async close(): Promise<void> {
    if (this.writer !== this.reader) await this.writer.quit()
    await this.reader.quit()
  }
}
