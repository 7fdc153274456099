import { StreamConnectionError } from './errors'
import type { StreamEntry } from './events'
import type { ReadGroupOptions, StreamBroker } from './stream-broker'

type GroupState = {
  /** Index into the stream of the next never-delivered entry. */
  nextIndex: number
  /** Delivered but unacknowledged entry ids, mapped to their consumer. */
  pending: Map<string, string>
}

type StreamState = {
  entries: StreamEntry[]
  groups: Map<string, GroupState>
}

/**
 * In-process broker with Redis consumer-group semantics, for tests. It keeps
 * every entry and acknowledgement it sees, so it is not meant to run a server.
 */
export class InMemoryStreamBroker implements StreamBroker {
  private readonly streams = new Map<string, StreamState>()
  private readonly waiters = new Set<() => void>()
  private sequence = 0
  private failingReads = 0
  private failingAcks = 0

  /** Every acknowledgement, in order. */
  readonly acks: { stream: string; id: string }[] = []

  /** When set, ensureGroup rejects with this error. */
  groupSetupError: Error | null = null

  /** Makes the next `count` reads fail as if the connection dropped. */
  failNextReads(count: number): void {
    this.failingReads = count
  }

  /** Makes the next `count` acknowledgements fail, leaving the entries pending. */
  failNextAcks(count: number): void {
    this.failingAcks = count
  }

  private stream(name: string): StreamState {
    let state = this.streams.get(name)
    if (!state) {
      state = { entries: [], groups: new Map() }
      this.streams.set(name, state)
    }
    return state
  }

  async ensureGroup(stream: string, group: string): Promise<'created' | 'exists'> {
    if (this.groupSetupError) throw this.groupSetupError
    const state = this.stream(stream)
    if (state.groups.has(group)) return 'exists'
    state.groups.set(group, { nextIndex: 0, pending: new Map() })
    return 'created'
  }

  async readGroup(options: ReadGroupOptions): Promise<StreamEntry[]> {
    if (this.failingReads > 0) {
      this.failingReads--
      throw new StreamConnectionError('connection refused')
    }
    let entries = this.collect(options)
    if (entries.length === 0 && options.cursor === '>' && options.blockMs > 0) {
      await this.waitForPublish(options.blockMs)
      entries = this.collect(options)
    }
    return entries
  }

  private collect(options: ReadGroupOptions): StreamEntry[] {
    const out: StreamEntry[] = []
    for (const name of options.streams) {
      const state = this.streams.get(name)
      const group = state?.groups.get(options.group)
      if (!state || !group) throw new StreamConnectionError(`NOGROUP ${options.group} on ${name}`)

      if (options.cursor === '0') {
        const mine = state.entries.filter((e) => group.pending.get(e.id) === options.consumer)
        out.push(...mine.slice(0, options.count))
        continue
      }

      const fresh = state.entries.slice(group.nextIndex, group.nextIndex + options.count)
      group.nextIndex += fresh.length
      for (const entry of fresh) group.pending.set(entry.id, options.consumer)
      out.push(...fresh)
    }
    return out
  }

  private waitForPublish(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer)
        this.waiters.delete(wake)
        resolve()
      }
      const timer = setTimeout(wake, timeoutMs)
      this.waiters.add(wake)
    })
  }

  async ack(stream: string, group: string, id: string): Promise<void> {
    if (this.failingAcks > 0) {
      this.failingAcks--
      throw new StreamConnectionError(`XACK ${stream} ${id} failed`)
    }
    this.streams.get(stream)?.groups.get(group)?.pending.delete(id)
    this.acks.push({ stream, id })
  }

  async publish(stream: string, fields: Record<string, string>): Promise<string> {
    const id = `${++this.sequence}-0`
    this.stream(stream).entries.push({ id, stream, fields: { ...fields } })
    for (const wake of [...this.waiters]) wake()
    return id
  }

  /** Ids delivered to a group and not yet acknowledged. */
  pendingIds(stream: string, group: string): string[] {
    return [...(this.streams.get(stream)?.groups.get(group)?.pending.keys() ?? [])]
  }

  async close(): Promise<void> {
    for (const wake of [...this.waiters]) wake()
  }
}
