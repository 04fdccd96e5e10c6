import process from "node:process";
import postgres from "postgres";

let sqlInstance: postgres.Sql | null = null;

/** Shared postgres.js client; created on first use from DATABASE_URL. */
export function getDb(): postgres.Sql {
  if (!sqlInstance) {
    const url = process.env.DATABASE_URL;
    if (!url) {
      throw new Error("DATABASE_URL environment variable is required");
    }
    sqlInstance = postgres(url, {
      max: 5,
      idle_timeout: 30,
      connect_timeout: 10,
      onnotice: () => {}, // CREATE ... IF NOT EXISTS emits NOTICEs on every migrate
    });
  }
  return sqlInstance;
}

export async function closeDb(): Promise<void> {
  if (sqlInstance) {
    await sqlInstance.end({ timeout: 5 });
    sqlInstance = null;
  }
}
