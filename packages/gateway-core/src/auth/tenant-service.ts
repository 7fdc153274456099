import { z } from 'zod'
import type { QueryFn } from '../db/client'
import type { TenantUsageSummary } from '../types'

export type BillingStatus = {
  planTier: string
  scansCount: number
  tokenCount: number
}

/** Read side of the tenant and usage tables. Writes belong to the usage worker. */
export interface TenantUsageReader {
  getBillingStatus(tenantId: string): Promise<BillingStatus | null>
  listTopTenants(limit: number): Promise<TenantUsageSummary[]>
}

const count = z.union([z.number(), z.string()]).nullable().transform((v) => Number(v ?? 0))

const billingRowSchema = z.object({
  plan_tier: z.string(),
  scans_count: count,
  token_count: count,
})

const summaryRowSchema = z.object({
  tenant_name: z.string(),
  plan: z.string(),
  scans: count,
  tokens: count,
})

export class PgTenantUsageReader implements TenantUsageReader {
  constructor(private readonly query: QueryFn) {}

  async getBillingStatus(tenantId: string): Promise<BillingStatus | null> {
    const result = await this.query(
      `SELECT t.plan_tier, tu.scans_count, tu.token_count
         FROM tenants t
         LEFT JOIN tenant_usage tu ON t.id = tu.tenant_id
        WHERE t.id = $1`,
      [tenantId],
    )
    const row = result.rows[0]
    if (!row) return null
    const r = billingRowSchema.parse(row)
    return { planTier: r.plan_tier, scansCount: r.scans_count, tokenCount: r.token_count }
  }

  async listTopTenants(limit: number): Promise<TenantUsageSummary[]> {
    const result = await this.query(
      `SELECT t.name AS tenant_name,
              t.plan_tier AS plan,
              COALESCE(tu.scans_count, 0) AS scans,
              COALESCE(tu.token_count, 0) AS tokens
         FROM tenants t
         LEFT JOIN tenant_usage tu ON t.id = tu.tenant_id
        ORDER BY tu.scans_count DESC NULLS LAST
        LIMIT $1`,
      [limit],
    )
    return result.rows.map((row) => {
      const r = summaryRowSchema.parse(row)
      return { name: r.tenant_name, plan: r.plan, scans: r.scans, tokens: r.tokens }
    })
  }
}
