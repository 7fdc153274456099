export const ROLES = ['viewer', 'auditor', 'admin'] as const

export type Role = (typeof ROLES)[number]

export type Identity = {
  id: string
  username: string
  role: Role
  email: string
  metadata: Record<string, unknown>
}

/** Fields a caller supplies when minting a credential; the rest default. */
export type IdentityInput = Pick<Identity, 'id' | 'username'> & Partial<Omit<Identity, 'id' | 'username'>>

export type ApiKeyRecord = {
  id: string
  keyHash: string
  identity: Identity
  createdAt: string
}

export type WebhookPlatform = 'github' | 'gitlab'

export type WebhookEvent = {
  id: string
  platform: WebhookPlatform
  eventType: string
  repository: string
  ref: string
  sender: string
  action: string
  tenantId: string | null
  receivedAt: string
}

export type Tenant = {
  id: string
  name: string
  planTier: string
}

export type TenantUsage = {
  tenantId: string
  scansCount: number
  tokenCount: number
  lastUpdated: string
}

/** One row of the cross-tenant admin report. */
export type TenantUsageSummary = {
  name: string
  plan: string
  scans: number
  tokens: number
}
