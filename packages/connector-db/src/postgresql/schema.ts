import { readFile } from 'node:fs/promises';
import type { Queryable } from './client.js';

const SCHEMA_URL = new URL('../../sql/schema.sql', import.meta.url);

export async function readSchemaSql(): Promise<string> {
  return await readFile(SCHEMA_URL, 'utf-8');
}

/**
 * Create the snowmatch tables if they do not exist. Idempotent.
 */
export async function applySchema(db: Queryable): Promise<void> {
  const sql = await readSchemaSql();
  await db.query(sql, [], 'WRITE_FAILED');
}
