import { readFile } from 'node:fs/promises'
import type { QueryFn } from './client'

const SCHEMA_URL = new URL('../../sql/schema.sql', import.meta.url)

export async function loadSchemaSql(): Promise<string> {
  return readFile(SCHEMA_URL, 'utf8')
}

/** Creates the control-plane tables if they do not exist yet. */
export async function applySchema(query: QueryFn): Promise<void> {
  await query(await loadSchemaSql())
}
