/**
 * @snaplink/db - PostgreSQL persistence
 *
 * Usage:
 * ```ts
 * import { createDatabase, PgShortUrlRepository } from "@snaplink/db";
 *
 * const db = createDatabase({ connectionString: process.env.DATABASE_URL, logger });
 * const repository = new PgShortUrlRepository(db, { logger });
 * ```
 */

export * from "./client.js";
export * from "./event-codec.js";
export * from "./short-url-repository.js";
export { migrate, listMigrations, MIGRATIONS_DIR } from "./migrate.js";
