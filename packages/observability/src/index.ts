export {
  SERVICE_NAMESPACE,
  SERVICE_NAMES,
  SPAN_NAMES,
  ATTR_KEYS,
  SAMPLING_DEFAULTS,
  normalizeEnvironment,
  getAtlasEnv,
} from './conventions'
export type { AtlasEnvironment } from './conventions'

export { configureHashSalt, hashForTelemetry } from './hash'

export { createLogger, loggerOptions, silentLogger, createMemoryLogger } from './logger'
export type { Logger, LoggerConfig, LogLine } from './logger'

export { sanitizeErrorForTelemetry, classifyError } from './sanitize'

export { initSentry, captureError, captureMessage, flushSentry, scrubEvent } from './sentry'
export type { SentryInitOptions, ErrorContext } from './sentry'

export { initTracing, withSpan, shutdownTracing } from './tracing'
export type { TracingOptions } from './tracing'
