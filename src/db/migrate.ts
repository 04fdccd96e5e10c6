import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { getDb } from "./client.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Apply src/db/schema.sql. Every statement is idempotent. */
export async function runMigrations(): Promise<void> {
  const sql = getDb();

  // The bundled build has no schema.sql beside it; fall back to the inline copy.
  let schema: string;
  try {
    schema = fs.readFileSync(path.join(__dirname, "schema.sql"), "utf-8");
  } catch {
    schema = getInlineSchema();
  }

  await sql.unsafe(schema);
}

function getInlineSchema(): string {
  return `
CREATE TABLE IF NOT EXISTS config (
  key TEXT PRIMARY KEY,
  value JSONB NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS scheduled_tasks (
  id UUID PRIMARY KEY,
  seq BIGINT GENERATED ALWAYS AS IDENTITY,
  name TEXT NOT NULL,
  command TEXT NOT NULL,
  schedule TEXT NOT NULL,
  enabled BOOLEAN NOT NULL DEFAULT true,
  last_run_at TIMESTAMPTZ,
  last_result JSONB,
  consecutive_failures INT NOT NULL DEFAULT 0,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_scheduled_tasks_seq ON scheduled_tasks(seq);
CREATE INDEX IF NOT EXISTS idx_scheduled_tasks_enabled ON scheduled_tasks(enabled);
  `.trim();
}
