import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { WebhookEvent, WebhookPlatform } from '../types'

const githubPayloadSchema = z.object({
  ref: z.string().optional(),
  action: z.string().optional(),
  repository: z.object({ full_name: z.string().optional() }).passthrough().optional(),
  sender: z.object({ login: z.string().optional() }).passthrough().optional(),
}).passthrough()

const gitlabPayloadSchema = z.object({
  object_kind: z.string().optional(),
  ref: z.string().optional(),
  user_name: z.string().optional(),
  project: z.object({ path_with_namespace: z.string().optional() }).passthrough().optional(),
}).passthrough()

export class WebhookPayloadError extends Error {
  readonly statusCode = 400

  constructor(message: string) {
    super(message)
    this.name = 'WebhookPayloadError'
  }
}

export type WebhookContext = {
  /** X-GitHub-Event; GitLab carries its kind in the body. */
  eventHeader?: string
  tenantId?: string | null
  receivedAt?: Date
  id?: string
}

function parseJson(rawBody: Buffer): unknown {
  try {
    return JSON.parse(rawBody.toString('utf8'))
  } catch {
    throw new WebhookPayloadError('Webhook body is not valid JSON')
  }
}

export function parseWebhookEvent(platform: WebhookPlatform, rawBody: Buffer, ctx: WebhookContext = {}): WebhookEvent {
  const json = parseJson(rawBody)
  const base = {
    id: ctx.id ?? randomUUID(),
    platform,
    tenantId: ctx.tenantId || null,
    receivedAt: (ctx.receivedAt ?? new Date()).toISOString(),
  }

  if (platform === 'github') {
    const parsed = githubPayloadSchema.safeParse(json)
    if (!parsed.success) throw new WebhookPayloadError('Unexpected GitHub webhook payload')
    const body = parsed.data
    return {
      ...base,
      eventType: ctx.eventHeader || 'unknown',
      repository: body.repository?.full_name ?? '',
      ref: body.ref ?? '',
      sender: body.sender?.login ?? '',
      action: body.action ?? '',
    }
  }

  const parsed = gitlabPayloadSchema.safeParse(json)
  if (!parsed.success) throw new WebhookPayloadError('Unexpected GitLab webhook payload')
  const body = parsed.data
  return {
    ...base,
    eventType: body.object_kind || 'unknown',
    repository: body.project?.path_with_namespace ?? '',
    ref: body.ref ?? '',
    sender: body.user_name ?? '',
    action: '',
  }
}
