import pg from 'pg'
import type { Logger } from '@atlas/observability'

export type QueryFn = (sql: string, params?: unknown[]) => Promise<{ rows: Record<string, unknown>[] }>

export type DbClient = {
  query: QueryFn
  /**
   * Runs `fn` on one pooled connection inside BEGIN/COMMIT. The connection is
   * rolled back on error and released on every exit path.
   */
  transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T>
  close(): Promise<void>
}

/** The slice of a pg pool the client needs. */
export type PoolLike = {
  query: QueryFn
  connect(): Promise<{ query: QueryFn; release(err?: Error): void }>
  end(): Promise<void>
}

export function createDbClientFromPool(pool: PoolLike, logger?: Logger): DbClient {
  return {
    query: (sql, params) => pool.query(sql, params),

    async transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T> {
      const conn = await pool.connect()
      let releaseError: Error | undefined
      try {
        await conn.query('BEGIN')
        const result = await fn((sql, params) => conn.query(sql, params))
        await conn.query('COMMIT')
        return result
      } catch (err) {
        try {
          await conn.query('ROLLBACK')
        } catch (rollbackErr) {
          // A connection that cannot roll back must not go back into the pool
          releaseError = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr))
          logger?.error({ err: rollbackErr }, '[db] ROLLBACK failed')
        }
        throw err
      } finally {
        conn.release(releaseError)
      }
    },

    close: () => pool.end(),
  }
}

export type DbClientOptions = {
  databaseUrl: string
  maxConnections?: number
  logger: Logger
}

export function createDbClient(options: DbClientOptions): DbClient | undefined {
  if (!options.databaseUrl) {
    options.logger.warn('[db] DATABASE_URL not set — DB features disabled')
    return undefined
  }
  const pool = new pg.Pool({ connectionString: options.databaseUrl, max: options.maxConnections ?? 20 })
  pool.on('error', (err) => options.logger.error({ err }, '[db] Idle client error'))

  return createDbClientFromPool({
    query: (sql, params) => pool.query(sql, params),
    async connect() {
      const client = await pool.connect()
      return {
        query: (sql, params) => client.query(sql, params),
        release: (err) => client.release(err),
      }
    },
    end: () => pool.end(),
  }, options.logger)
}
