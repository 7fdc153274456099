import type {
  BillingStatus, DbClient, QueryFn, Tenant, TenantUsage, TenantUsageReader, TenantUsageSummary,
} from '@atlas/gateway-core'
import type { UsageIncrement } from './events'

export const DEFAULT_PLAN_TIER = 'free'

/** One open batch. Each `apply` succeeds or fails on its own. */
export interface UsageTransaction {
  apply(increment: UsageIncrement): Promise<void>
}

export interface UsageStore {
  /** Runs `fn` in one transaction, committed when `fn` resolves. */
  batch<T>(fn: (tx: UsageTransaction) => Promise<T>): Promise<T>
}

const UPSERT_TENANT = `INSERT INTO tenants (id, name, plan_tier)
  VALUES ($1, $1, '${DEFAULT_PLAN_TIER}')
  ON CONFLICT (id) DO NOTHING`

const UPSERT_USAGE = `INSERT INTO tenant_usage (tenant_id, scans_count, token_count)
  VALUES ($1, 0, 0)
  ON CONFLICT (tenant_id) DO NOTHING`

const INCREMENT = {
  tokens: 'UPDATE tenant_usage SET token_count = token_count + $2, last_updated = NOW() WHERE tenant_id = $1',
  scans: 'UPDATE tenant_usage SET scans_count = scans_count + $2, last_updated = NOW() WHERE tenant_id = $1',
} as const

class PgUsageTransaction implements UsageTransaction {
  constructor(private readonly query: QueryFn) {}

  async apply(increment: UsageIncrement): Promise<void> {
    await this.query('SAVEPOINT usage_increment')
    try {
      await this.query(UPSERT_TENANT, [increment.tenantId])
      await this.query(UPSERT_USAGE, [increment.tenantId])
      await this.query(INCREMENT[increment.kind], [increment.tenantId, increment.amount])
    } catch (err) {
      await this.query('ROLLBACK TO SAVEPOINT usage_increment')
      throw err
    }
    await this.query('RELEASE SAVEPOINT usage_increment')
  }
}

/**
 * Postgres counters. Tenant and usage rows are created on first sight with
 * insert-if-absent, so concurrent batches never collide on the primary key.
 */
export class PgUsageStore implements UsageStore {
  constructor(private readonly db: Pick<DbClient, 'transaction'>) {}

  batch<T>(fn: (tx: UsageTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((query) => fn(new PgUsageTransaction(query)))
  }
}

/**
 * Process-local counters, also readable through TenantUsageReader so the
 * billing routes work without a database. Writes are staged per batch and
 * become visible on commit.
 */
export class InMemoryUsageStore implements UsageStore, TenantUsageReader {
  private tenants = new Map<string, Tenant>()
  private usage = new Map<string, TenantUsage>()
  private commitError: Error | null = null

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Makes the next batch fail at commit time, discarding its writes. */
  failNextCommit(err: Error): void {
    this.commitError = err
  }

  addTenant(tenant: Tenant): void {
    this.tenants.set(tenant.id, { ...tenant })
  }

  async batch<T>(fn: (tx: UsageTransaction) => Promise<T>): Promise<T> {
    const tenants = new Map(this.tenants)
    const usage = new Map([...this.usage].map(([id, u]): [string, TenantUsage] => [id, { ...u }]))

    const result = await fn({
      apply: async (increment) => {
        const id = increment.tenantId
        if (!tenants.has(id)) tenants.set(id, { id, name: id, planTier: DEFAULT_PLAN_TIER })
        const counters = usage.get(id) ?? { tenantId: id, scansCount: 0, tokenCount: 0, lastUpdated: '' }
        if (increment.kind === 'tokens') counters.tokenCount += increment.amount
        else counters.scansCount += increment.amount
        counters.lastUpdated = this.now().toISOString()
        usage.set(id, counters)
      },
    })

    const commitError = this.commitError
    if (commitError) {
      this.commitError = null
      throw commitError
    }
    this.tenants = tenants
    this.usage = usage
    return result
  }

  listTenants(): Tenant[] {
    return [...this.tenants.values()]
  }

  getUsage(tenantId: string): TenantUsage | undefined {
    const counters = this.usage.get(tenantId)
    return counters ? { ...counters } : undefined
  }

  async getBillingStatus(tenantId: string): Promise<BillingStatus | null> {
    const tenant = this.tenants.get(tenantId)
    if (!tenant) return null
    const counters = this.usage.get(tenantId)
    return {
      planTier: tenant.planTier,
      scansCount: counters?.scansCount ?? 0,
      tokenCount: counters?.tokenCount ?? 0,
    }
  }

  async listTopTenants(limit: number): Promise<TenantUsageSummary[]> {
    return [...this.tenants.values()]
      .map((t) => ({
        name: t.name,
        plan: t.planTier,
        scans: this.usage.get(t.id)?.scansCount ?? 0,
        tokens: this.usage.get(t.id)?.tokenCount ?? 0,
      }))
      .sort((a, b) => b.scans - a.scans)
      .slice(0, Math.max(0, limit))
  }
}
