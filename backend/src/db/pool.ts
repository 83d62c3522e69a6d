import { Pool } from "pg";
import { env } from "../config/env";

let pool: Pool | null = null;

/** Shared pool, or null when DATABASE_URL is unset and reports stay in memory. */
export function getPool(): Pool | null {
  if (!env.DATABASE_URL) return null;
  if (!pool) {
    /** Render external Postgres requires SSL; internal URL does not. */
    const useSsl = env.DATABASE_URL.includes("render.com");
    pool = new Pool({
      connectionString: env.DATABASE_URL,
      ...(useSsl && { ssl: { rejectUnauthorized: true } })
    });
  }
  return pool;
}

export async function assertDatabaseConnection(db: Pool): Promise<void> {
  const client = await db.connect();
  try {
    await client.query("SELECT 1");
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
