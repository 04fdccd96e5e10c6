import { getDb } from "./client.ts";

export interface ConfigEntry {
  key: string;
  value: unknown;
  updatedAt: Date;
}

interface ConfigRow {
  key: string;
  value: unknown;
  updated_at: Date;
}

export async function getConfigValue<T = unknown>(key: string): Promise<T | null> {
  const sql = getDb();
  const [row] = await sql<[{ value: T }?]>`
    SELECT value FROM config WHERE key = ${key}
  `;
  return row?.value ?? null;
}

export async function setConfigValue(key: string, value: unknown): Promise<void> {
  const sql = getDb();
  const json = JSON.stringify(value);
  await sql`
    INSERT INTO config (key, value, updated_at)
    VALUES (${key}, ${json}::jsonb, now())
    ON CONFLICT (key) DO UPDATE SET
      value = EXCLUDED.value,
      updated_at = now()
  `;
}

/** Returns false when there was no such key. */
export async function deleteConfigValue(key: string): Promise<boolean> {
  const sql = getDb();
  const result = await sql`DELETE FROM config WHERE key = ${key}`;
  return result.count > 0;
}

export async function listConfig(): Promise<ConfigEntry[]> {
  const sql = getDb();
  const rows = await sql<ConfigRow[]>`
    SELECT key, value, updated_at FROM config ORDER BY key
  `;
  return rows.map((row) => ({ key: row.key, value: row.value, updatedAt: row.updated_at }));
}
