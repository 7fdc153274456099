import type { FastifyError, FastifyInstance } from 'fastify'
import { ZodError } from 'zod'
import { AuthError, DuplicateApiKeyError, SignatureVerificationError } from '../errors'
import { WebhookPayloadError } from '../webhooks/payload'

export type UnexpectedErrorHook = (error: unknown, operation: string) => void

/**
 * Maps domain errors to `{ error, reason }` responses. Anything unrecognised
 * becomes a bare 500; its message is reported through `onUnexpected` only.
 */
export function registerErrorHandler(app: FastifyInstance, onUnexpected: UnexpectedErrorHook): void {
  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    if (error instanceof DuplicateApiKeyError) {
      return reply.status(error.statusCode).send({ error: error.message, reason: error.reason })
    }
    if (error instanceof AuthError || error instanceof SignatureVerificationError) {
      request.log.info({ reason: error.reason }, 'request rejected')
      return reply.status(error.statusCode).send({ error: error.message, reason: error.reason })
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Invalid request',
        reason: 'validation_failed',
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      })
    }
    if (error instanceof WebhookPayloadError) {
      return reply.status(400).send({ error: error.message, reason: 'invalid_payload' })
    }
    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      // Fastify's own client errors (body too large, bad content type, ...)
      return reply.status(error.statusCode).send({ error: error.message })
    }

    onUnexpected(error, `${request.method} ${request.routeOptions.url ?? request.url}`)
    request.log.error({ err: error }, 'unhandled error')
    return reply.status(500).send({ error: 'Internal Server Error' })
  })
}
