/**
 * OTLP tracing, switched on with OTEL_ENABLED=true. Until then `withSpan`
 * runs against the no-op tracer of @opentelemetry/api.
 */
import { SpanStatusCode, context, trace } from '@opentelemetry/api'
import type { Span } from '@opentelemetry/api'
import { SERVICE_NAMESPACE } from './conventions'
import type { AtlasEnvironment } from './conventions'
import { configureHashSalt } from './hash'
import type { Logger } from './logger'

export type TracingOptions = {
  serviceName: string
  environment: AtlasEnvironment
  logger: Logger
}

let sdk: { shutdown(): Promise<void> } | null = null

export async function initTracing(options: TracingOptions): Promise<void> {
  const { serviceName, environment, logger } = options
  configureHashSalt(process.env.OTEL_HASH_SALT, environment, logger)
  if (process.env.OTEL_ENABLED !== 'true') return

  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318'
  try {
    const [
      { NodeSDK },
      { OTLPTraceExporter },
      { resourceFromAttributes },
      { ATTR_SERVICE_NAME },
      { BatchSpanProcessor },
    ] = await Promise.all([
      import('@opentelemetry/sdk-node'),
      import('@opentelemetry/exporter-trace-otlp-http'),
      import('@opentelemetry/resources'),
      import('@opentelemetry/semantic-conventions'),
      import('@opentelemetry/sdk-trace-base'),
    ])

    const started = new NodeSDK({
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: serviceName,
        'service.namespace': SERVICE_NAMESPACE,
        'deployment.environment.name': environment,
      }),
      spanProcessors: [new BatchSpanProcessor(new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }))],
    })
    started.start()
    sdk = started
    logger.info({ endpoint, environment }, `[otel] Exporting traces for ${serviceName}`)
  } catch (err) {
    logger.warn({ err }, '[otel] Tracing SDK failed to start; spans are dropped')
  }
}

/** Runs `fn` inside a span that ends with it and records a thrown error. */
export async function withSpan<T>(
  name: string,
  attrs: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const span = trace.getTracer(SERVICE_NAMESPACE).startSpan(name, { attributes: attrs })
  try {
    const result = await context.with(trace.setSpan(context.active(), span), () => fn(span))
    span.setStatus({ code: SpanStatusCode.OK })
    return result
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err))
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message })
    span.recordException(error)
    throw err
  } finally {
    span.end()
  }
}

export async function shutdownTracing(): Promise<void> {
  const running = sdk
  sdk = null
  await running?.shutdown()
}
