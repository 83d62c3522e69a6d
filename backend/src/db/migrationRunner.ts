import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

const MIGRATIONS_DIR = path.resolve(process.cwd(), "backend", "migrations");

/** The parts of pg's Pool and PoolClient the runner touches. */
export type MigrationClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
};
export type MigrationPool = {
  connect(): Promise<MigrationClient>;
};

const appliedRowSchema = z.object({ filename: z.string() });

async function ensureMigrationTable(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id BIGSERIAL PRIMARY KEY,
      filename TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

/** Apply pending .sql files in name order inside one transaction. */
export async function runMigrations(pool: MigrationPool, migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await ensureMigrationTable(client);

    const files = (await fs.readdir(migrationsDir)).filter((name) => name.endsWith(".sql")).sort();

    const applied = await client.query("SELECT filename FROM schema_migrations");
    const appliedSet = new Set(applied.rows.map((row) => appliedRowSchema.parse(row).filename));
    const newlyApplied: string[] = [];

    for (const file of files) {
      if (appliedSet.has(file)) continue;
      console.log(`[migrate] applying ${file}`);
      const migrationSql = await fs.readFile(path.join(migrationsDir, file), "utf8");
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [file]);
      newlyApplied.push(file);
    }

    await client.query("COMMIT");
    return newlyApplied;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}
