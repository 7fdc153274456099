/**
 * Error sanitization for telemetry - drops attached payloads and masks
 * connection strings before an error leaves the process.
 */

const CONNECTION_STRING = /\b(postgres(?:ql)?|redis|rediss):\/\/\S+/gi

function redact(text: string): string {
  return text.replace(CONNECTION_STRING, '$1://[REDACTED]')
}

export function sanitizeErrorForTelemetry(err: unknown): Error {
  if (!(err instanceof Error)) return new Error(redact(String(err)))

  // A fresh Error carries none of the response/body/config props drivers attach
  const safe = new Error(redact(err.message))
  safe.name = err.name
  safe.stack = err.stack ? redact(err.stack) : undefined
  return safe
}

export function classifyError(err: unknown): string {
  if (!(err instanceof Error)) return 'unknown_error'
  // Wrapped transport errors carry the driver's message on `cause`
  const cause = err.cause instanceof Error ? ` ${err.cause.message}` : ''
  const msg = `${err.message}${cause}`.toLowerCase()
  if (msg.includes('timeout') || msg.includes('abort')) return 'timeout'
  if (msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('econnreset')) return 'network_error'
  if (msg.includes('connection is closed') || msg.includes('connection terminated')) return 'connection_closed'
  if (msg.includes('syntax error') || msg.includes('violates')) return 'database_error'
  if (msg.includes('json')) return 'payload_error'
  return 'internal_error'
}
