import { z } from 'zod'
import type { Logger } from '@atlas/observability'
import type { ApiKeyRegistry } from '../auth/api-key-service'
import { DuplicateApiKeyError } from '../errors'
import { ROLES } from '../types'

const seedSchema = z.array(z.object({
  key: z.string().min(1),
  id: z.string().optional(),
  userId: z.string(),
  username: z.string(),
  role: z.enum(ROLES).default('viewer'),
  email: z.string().default(''),
}))

/**
 * Registers API keys listed as JSON, e.g. for CI onboarding:
 * `[{"key":"...","userId":"ci1","username":"ci-bot","role":"auditor"}]`.
 * Returns the number registered; a malformed list registers none, and a key
 * already held by another id is skipped.
 */
export async function seedApiKeys(registry: ApiKeyRegistry, raw: string, logger: Logger): Promise<number> {
  if (!raw) return 0
  let seeds: z.infer<typeof seedSchema>
  try {
    seeds = seedSchema.parse(JSON.parse(raw))
  } catch (err) {
    logger.error({ err: err instanceof z.ZodError ? err.issues : 'invalid JSON' }, '[auth] Failed to parse seeded API keys')
    return 0
  }
  let registered = 0
  for (const s of seeds) {
    try {
      await registry.register({
        rawKey: s.key,
        id: s.id,
        identity: { id: s.userId, username: s.username, role: s.role, email: s.email, metadata: { seeded: true } },
      })
      registered++
    } catch (err) {
      if (!(err instanceof DuplicateApiKeyError)) throw err
      logger.warn({ userId: s.userId, id: s.id }, '[auth] Seeded API key already registered under another id; skipped')
    }
  }
  logger.info(`[auth] Seeded ${registered} API key(s)`)
  return registered
}
