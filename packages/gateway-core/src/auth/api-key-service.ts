import { z } from 'zod'
import { sha256Hex } from '../crypto'
import { DuplicateApiKeyError } from '../errors'
import type { QueryFn } from '../db/client'
import type { ApiKeyRecord, Identity } from '../types'
import { parseRole } from './token-codec'

export function hashApiKey(raw: string): string {
  return sha256Hex(raw)
}

export type RegisterApiKeyInput = {
  rawKey: string
  identity: Identity
  id?: string
  createdAt?: string
}

/**
 * Registry of opaque API keys. Only the SHA-256 hash of a key is ever stored.
 * Registering under an existing id replaces that key; registering a key that
 * another id holds throws DuplicateApiKeyError.
 */
export interface ApiKeyRegistry {
  lookup(rawKey: string): Promise<Identity | null>
  register(input: RegisterApiKeyInput): Promise<ApiKeyRecord>
  revoke(id: string): Promise<boolean>
  list(): Promise<ApiKeyRecord[]>
}

function toRecord(input: RegisterApiKeyInput): ApiKeyRecord {
  const keyHash = hashApiKey(input.rawKey)
  return {
    id: input.id ?? `key_${keyHash.slice(0, 12)}`,
    keyHash,
    identity: input.identity,
    createdAt: input.createdAt ?? new Date().toISOString(),
  }
}

/**
 * Process-local registry. Every operation completes synchronously inside one
 * turn of the event loop, so concurrent handlers never see a half-applied write.
 */
export class InMemoryApiKeyRegistry implements ApiKeyRegistry {
  private readonly byHash = new Map<string, ApiKeyRecord>()

  async lookup(rawKey: string): Promise<Identity | null> {
    return this.byHash.get(hashApiKey(rawKey))?.identity ?? null
  }

  async register(input: RegisterApiKeyInput): Promise<ApiKeyRecord> {
    const record = toRecord(input)
    const holder = this.byHash.get(record.keyHash)
    if (holder && holder.id !== record.id) throw new DuplicateApiKeyError()
    for (const [hash, existing] of this.byHash) {
      if (existing.id === record.id) this.byHash.delete(hash)
    }
    this.byHash.set(record.keyHash, record)
    return record
  }

  async revoke(id: string): Promise<boolean> {
    for (const [hash, record] of this.byHash) {
      if (record.id === id) {
        this.byHash.delete(hash)
        return true
      }
    }
    return false
  }

  async list(): Promise<ApiKeyRecord[]> {
    return [...this.byHash.values()]
  }

  /** Test-only: clear all keys */
  _reset(): void {
    this.byHash.clear()
  }
}

const apiKeyRowSchema = z.object({
  id: z.string(),
  key_hash: z.string(),
  user_id: z.string(),
  username: z.string(),
  role: z.string(),
  email: z.string().nullable(),
  metadata: z.record(z.unknown()).nullable(),
  created_at: z.coerce.date(),
})

function fromRow(row: Record<string, unknown>): ApiKeyRecord {
  const r = apiKeyRowSchema.parse(row)
  return {
    id: r.id,
    keyHash: r.key_hash,
    identity: {
      id: r.user_id,
      username: r.username,
      role: parseRole(r.role),
      email: r.email ?? '',
      metadata: r.metadata ?? {},
    },
    createdAt: r.created_at.toISOString(),
  }
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505'
}

const SELECT_COLUMNS = 'id, key_hash, user_id, username, role, email, metadata, created_at'

export class PgApiKeyRegistry implements ApiKeyRegistry {
  constructor(private readonly query: QueryFn) {}

  async lookup(rawKey: string): Promise<Identity | null> {
    const result = await this.query(
      `SELECT ${SELECT_COLUMNS} FROM api_keys WHERE key_hash = $1`,
      [hashApiKey(rawKey)],
    )
    const row = result.rows[0]
    return row ? fromRow(row).identity : null
  }

  async register(input: RegisterApiKeyInput): Promise<ApiKeyRecord> {
    const record = toRecord(input)
    const { identity } = record
    try {
      await this.query(
        `INSERT INTO api_keys (id, key_hash, user_id, username, role, email, metadata, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (id) DO UPDATE SET
           key_hash = EXCLUDED.key_hash,
           user_id  = EXCLUDED.user_id,
           username = EXCLUDED.username,
           role     = EXCLUDED.role,
           email    = EXCLUDED.email,
           metadata = EXCLUDED.metadata`,
        [
          record.id, record.keyHash, identity.id, identity.username, identity.role,
          identity.email, JSON.stringify(identity.metadata), record.createdAt,
        ],
      )
    } catch (err) {
      // Conflicts on id update in place, so only key_hash can collide here
      if (isUniqueViolation(err)) throw new DuplicateApiKeyError()
      throw err
    }
    return record
  }

  async revoke(id: string): Promise<boolean> {
    const result = await this.query('DELETE FROM api_keys WHERE id = $1 RETURNING id', [id])
    return result.rows.length > 0
  }

  async list(): Promise<ApiKeyRecord[]> {
    const result = await this.query(`SELECT ${SELECT_COLUMNS} FROM api_keys ORDER BY created_at`)
    return result.rows.map(fromRow)
  }
}
