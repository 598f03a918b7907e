import { loadConfig } from "../config";
import { runMigrations } from "../db/migrations";
import { createPool } from "../db/pool";
import { createLoggers } from "../logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const loggers = createLoggers(config.logLevel);
  const pool = createPool(config.databaseUrl);

  try {
    const applied = await runMigrations(pool, {
      migrationsDir: config.migrationsDir ?? undefined,
      logger: loggers.db
    });
    loggers.db.info({ applied }, "migrations complete");
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("migration failed", error);
  process.exit(1);
});
