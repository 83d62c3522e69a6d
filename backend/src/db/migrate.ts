import { closePool, getPool } from "./pool";
import { runMigrations } from "./migrationRunner";

async function main(): Promise<void> {
  const pool = getPool();
  if (!pool) {
    throw new Error("DATABASE_URL is not set; reports are kept in memory and there is nothing to migrate.");
  }
  const applied = await runMigrations(pool);
  if (applied.length === 0) {
    console.log("No new migrations to apply.");
  } else {
    console.log(`Applied migrations: ${applied.join(", ")}`);
  }
}

main()
  .catch((error) => {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool();
  });
