/**
 * SQL migration runner
 *
 * Applies every `sql/*.sql` file not yet recorded in `schema_migrations`, in
 * file name order, each in its own transaction.
 *
 * Usage:
 *   DATABASE_URL=postgresql://... tsx packages/db/src/migrate.ts
 */

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { createLogger, type Logger } from "@snaplink/logger";
import { createDatabase, transaction, type Database } from "./client.js";

export const MIGRATIONS_DIR = path.join(__dirname, "..", "sql");

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = await readdir(dir);
  return files.filter((file) => file.endsWith(".sql")).sort();
}

/**
 * Apply pending migrations. Returns the names applied in this run.
 */
export async function migrate(db: Database, logger: Logger, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await db.query(
    "CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT now())"
  );
  const { rows } = await db.query("SELECT name FROM schema_migrations");
  const applied = new Set(rows.flatMap((row) => (typeof row.name === "string" ? [row.name] : [])));

  const ran: string[] = [];
  for (const name of await listMigrations(dir)) {
    if (applied.has(name)) continue;

    const sql = await readFile(path.join(dir, name), "utf8");
    await transaction(db, async (tx) => {
      await tx.query(sql);
      await tx.query("INSERT INTO schema_migrations (name) VALUES ($1)", [name]);
    });
    logger.info({ migration: name }, "Migration applied");
    ran.push(name);
  }
  return ran;
}

async function main(): Promise<void> {
  const logger = createLogger("migrate");
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }

  const db = createDatabase({ connectionString, logger });
  try {
    const ran = await migrate(db, logger);
    logger.info({ count: ran.length }, "Migrations complete");
  } finally {
    await db.end();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    createLogger("migrate").fatal({ err }, "Migration failed");
    process.exit(1);
  });
}
