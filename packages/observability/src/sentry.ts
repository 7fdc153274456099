/**
 * Sentry error reporting. Without SENTRY_DSN, reports go to the logger given
 * to `initSentry` instead.
 */
import * as Sentry from '@sentry/node'
import type { SeverityLevel } from '@sentry/node'
import { SAMPLING_DEFAULTS } from './conventions'
import type { AtlasEnvironment } from './conventions'
import type { Logger } from './logger'
import { sanitizeErrorForTelemetry } from './sanitize'

let initialized = false
let fallback: Logger | null = null

export type SentryInitOptions = {
  serviceName: string
  environment: AtlasEnvironment
  logger: Logger
}

export type ErrorContext = {
  service: string
  operation: string
  tenantId?: string
}

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-hub-signature-256', 'x-gitlab-token']
const SENSITIVE_KEY = /key|token|secret|signature/i

type ScrubbableEvent = {
  request?: { headers?: Record<string, string> }
  breadcrumbs?: { data?: Record<string, unknown> }[]
}

/** Drops credential headers and masks credential-looking breadcrumb fields. */
export function scrubEvent<E extends ScrubbableEvent>(event: E): E {
  const headers = event.request?.headers
  if (headers) {
    for (const name of Object.keys(headers)) {
      if (SENSITIVE_HEADERS.includes(name.toLowerCase())) delete headers[name]
    }
  }
  for (const crumb of event.breadcrumbs ?? []) {
    const data = crumb.data
    if (!data) continue
    for (const key of Object.keys(data)) {
      if (SENSITIVE_KEY.test(key)) data[key] = '[REDACTED]'
    }
  }
  return event
}

export function initSentry(options: SentryInitOptions): void {
  if (initialized) return
  fallback = options.logger

  const dsn = process.env.SENTRY_DSN
  if (!dsn) {
    options.logger.warn('[sentry] SENTRY_DSN not set; errors are only logged')
    return
  }

  Sentry.init({
    dsn,
    environment: options.environment,
    release: process.env.GIT_COMMIT_SHA || process.env.npm_package_version || 'dev',
    serverName: options.serviceName,
    tracesSampleRate: SAMPLING_DEFAULTS[options.environment] ?? 0.1,
    sendDefaultPii: false,
    beforeSend: (event) => scrubEvent(event),
  })
  initialized = true
  options.logger.info({ environment: options.environment }, `[sentry] Reporting errors for ${options.serviceName}`)
}

export function captureError(error: unknown, context: ErrorContext): void {
  const safe = sanitizeErrorForTelemetry(error)
  if (!initialized) {
    fallback?.error({ err: safe, ...context }, '[sentry-fallback] captured error')
    return
  }
  Sentry.withScope((scope) => {
    scope.setTag('service', context.service)
    scope.setTag('operation', context.operation)
    if (context.tenantId) scope.setTag('tenant_id', context.tenantId)
    Sentry.captureException(safe)
  })
}

export function captureMessage(message: string, level: SeverityLevel, extra: Record<string, string> = {}): void {
  if (!initialized) {
    fallback?.warn({ level, ...extra }, `[sentry-fallback] ${message}`)
    return
  }
  Sentry.withScope((scope) => {
    scope.setTags(extra)
    Sentry.captureMessage(message, level)
  })
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (initialized) await Sentry.flush(timeoutMs)
}
