import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { RelayLogger } from "../logger";

export interface MigrationFile {
  name: string;
  sql: string;
}

export interface MigrationRunner {
  query: (text: string, values?: unknown[]) => Promise<unknown>;
}

export interface MigrationClient extends MigrationRunner {
  release: () => void;
}

export interface MigrationPool {
  connect: () => Promise<MigrationClient>;
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  __dirname,
  "../../migrations"
);

const CREATE_MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const SELECT_APPLIED_SQL = `
SELECT name
FROM schema_migrations;
`;

const INSERT_APPLIED_SQL = `
INSERT INTO schema_migrations (name)
VALUES ($1);
`;

function isSqlFile(name: string): boolean {
  return name.endsWith(".sql");
}

function readAppliedNames(result: unknown): string[] {
  if (typeof result !== "object" || result === null || !("rows" in result)) {
    throw new Error("schema_migrations query returned no rows field");
  }

  const rows: unknown = result.rows;
  if (!Array.isArray(rows)) {
    throw new Error("schema_migrations query returned non-array rows");
  }

  return rows.map((row: unknown) => {
    if (typeof row === "object" && row !== null && "name" in row && typeof row.name === "string") {
      return row.name;
    }

    throw new Error("schema_migrations row is missing its name");
  });
}

export async function discoverMigrations(
  migrationsDir: string
): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDir);
  const sortedSqlFiles = files.filter(isSqlFile).sort();
  const migrations: MigrationFile[] = [];

  for (const fileName of sortedSqlFiles) {
    const sql = await readFile(path.join(migrationsDir, fileName), "utf8");
    migrations.push({ name: fileName, sql });
  }

  return migrations;
}

export async function getAppliedMigrationNames(
  runner: MigrationRunner
): Promise<Set<string>> {
  await runner.query(CREATE_MIGRATIONS_TABLE_SQL);
  return new Set(readAppliedNames(await runner.query(SELECT_APPLIED_SQL)));
}

export async function applyMigration(
  runner: MigrationRunner,
  migration: MigrationFile
): Promise<void> {
  await runner.query("BEGIN");

  try {
    await runner.query(migration.sql);
    await runner.query(INSERT_APPLIED_SQL, [migration.name]);
    await runner.query("COMMIT");
  } catch (error) {
    await runner.query("ROLLBACK");
    throw error;
  }
}

export interface RunMigrationsOptions {
  migrationsDir?: string;
  logger?: RelayLogger;
}

/**
 * Applies pending SQL migrations in file-name order, each in its own
 * transaction. Returns how many were applied.
 */
export async function runMigrations(
  pool: MigrationPool,
  options: RunMigrationsOptions = {}
): Promise<number> {
  const migrations = await discoverMigrations(
    options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR
  );
  const client = await pool.connect();

  try {
    const appliedNames = await getAppliedMigrationNames(client);
    let appliedCount = 0;

    for (const migration of migrations) {
      if (appliedNames.has(migration.name)) {
        continue;
      }

      await applyMigration(client, migration);
      options.logger?.info({ migration: migration.name }, "applied migration");
      appliedCount += 1;
      appliedNames.add(migration.name);
    }

    return appliedCount;
  } finally {
    client.release();
  }
}
