/** A single stream message could not be applied. Logged and acknowledged, never retried. */
export class AggregationError extends Error {
  readonly reason = 'aggregation_failed'

  constructor(
    message: string,
    readonly stream: string,
    readonly messageId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'AggregationError'
  }
}

/** The stream broker could not be reached. The consumer backs off and retries. */
export class StreamConnectionError extends Error {
  readonly reason = 'stream_unavailable'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StreamConnectionError'
  }
}
