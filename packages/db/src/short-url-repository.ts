/**
 * PostgreSQL ShortUrl repository
 *
 * Two tables, written in one transaction per save:
 *   short_url_events - append-only event log, PK (aggregate_id, version)
 *   short_urls       - current-state projection, short_code UNIQUE
 *
 * `getByShortCode` always replays the event log; the projection serves the
 * redirect lookup and uniqueness checks only.
 *
 * @see ../sql/001_init.sql
 */

import type { Logger } from "@snaplink/logger";
import {
  ConflictError,
  ShortUrlAggregate,
  ShortUrlStatus,
  TransientInfrastructureError,
  type PageRequest,
  type ShortUrlPage,
  type ShortUrlRecord,
  type ShortUrlRepository,
} from "@snaplink/core";
import { transaction, type Database, type Queryable } from "./client.js";
import {
  SHORT_URL_COLUMNS,
  decodeEvent,
  decodeShortUrlRow,
  encodeEvent,
  encodeShortUrlRow,
} from "./event-codec.js";

// =============================================================================
// Error classification
// =============================================================================

const UNIQUE_VIOLATION = "23505";
const SHORT_CODE_CONSTRAINT = "short_urls_short_code_key";

/** SQLSTATEs and socket errors worth a retry from the caller's side. */
const TRANSIENT_CODES = new Set([
  "57014", // query_canceled (statement_timeout)
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
  "53300", // too_many_connections
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
]);

interface PgErrorFields {
  code?: string;
  constraint?: string;
}

function pgErrorFields(error: unknown): PgErrorFields {
  if (typeof error !== "object" || error === null) return {};
  const fields: PgErrorFields = {};
  if ("code" in error && typeof error.code === "string") fields.code = error.code;
  if ("constraint" in error && typeof error.constraint === "string") fields.constraint = error.constraint;
  return fields;
}

/**
 * Whether `error` is an infrastructure failure rather than a bug or a
 * constraint the caller should see.
 */
export function isTransientDbError(error: unknown): boolean {
  const { code } = pgErrorFields(error);
  if (code !== undefined) {
    return TRANSIENT_CODES.has(code) || code.startsWith("08");
  }
  // pg-pool reports checkout timeouts and closed connections without a code
  return error instanceof Error && /timeout|terminated|Connection/i.test(error.message);
}

// =============================================================================
// SQL
// =============================================================================

const SELECT_COLUMNS = SHORT_URL_COLUMNS.join(", ");

const INSERT_PROJECTION = `INSERT INTO short_urls (${SELECT_COLUMNS})
VALUES (${SHORT_URL_COLUMNS.map((_, i) => `$${i + 1}`).join(", ")})`;

const UPDATE_PROJECTION = `UPDATE short_urls SET ${SHORT_URL_COLUMNS.slice(1)
  .map((column, i) => `${column} = $${i + 2}`)
  .join(", ")}
WHERE id = $1`;

const INSERT_EVENT = `INSERT INTO short_url_events (aggregate_id, version, event_id, event_type, occurred_at, payload)
VALUES ($1, $2, $3, $4, $5, $6::jsonb)`;

// =============================================================================
// Repository
// =============================================================================

export interface PgShortUrlRepositoryOptions {
  logger: Logger;
}

export class PgShortUrlRepository implements ShortUrlRepository {
  private readonly db: Database;
  private readonly logger: Logger;

  constructor(db: Database, options: PgShortUrlRepositoryOptions) {
    this.db = db;
    this.logger = options.logger;
  }

  async getByShortCode(shortCode: string): Promise<ShortUrlAggregate | null> {
    const { rows } = await this.run(() =>
      this.db.query(
        `SELECT e.payload
         FROM short_url_events e
         JOIN short_urls s ON s.id = e.aggregate_id
         WHERE s.short_code = $1
         ORDER BY e.version`,
        [shortCode]
      )
    );
    if (rows.length === 0) return null;
    return ShortUrlAggregate.fromEvents(rows.map((row) => decodeEvent(row.payload)));
  }

  async findActiveByShortCode(shortCode: string, now: Date): Promise<ShortUrlRecord | null> {
    const { rows } = await this.run(() =>
      this.db.query(
        `SELECT ${SELECT_COLUMNS}
         FROM short_urls
         WHERE short_code = $1
           AND status = $2
           AND (expires_at IS NULL OR expires_at > $3)`,
        [shortCode, ShortUrlStatus.ACTIVE, now]
      )
    );
    const row = rows[0];
    return row ? decodeShortUrlRow(row) : null;
  }

  async save(aggregate: ShortUrlAggregate, expectedVersion: number): Promise<void> {
    const events = aggregate.uncommittedEvents;
    if (events.length === 0) return;

    try {
      await transaction(this.db, async (tx) => {
        if (expectedVersion === 0) {
          await tx.query(INSERT_PROJECTION, encodeShortUrlRow(aggregate.record));
        } else {
          await this.lockAtVersion(tx, aggregate, expectedVersion);
          await tx.query(UPDATE_PROJECTION, encodeShortUrlRow(aggregate.record));
        }

        for (const event of events) {
          await tx.query(INSERT_EVENT, [
            event.aggregateId,
            event.version,
            event.eventId,
            event.type,
            event.occurredAt,
            encodeEvent(event),
          ]);
        }
      });
    } catch (error) {
      throw this.mapWriteError(error, aggregate.shortCode);
    }

    aggregate.markCommitted();
  }

  async existsByShortCode(shortCode: string): Promise<boolean> {
    const { rows } = await this.run(() =>
      this.db.query("SELECT 1 FROM short_urls WHERE short_code = $1", [shortCode])
    );
    return rows.length > 0;
  }

  async listByOwner(ownerId: string, page: PageRequest): Promise<ShortUrlPage> {
    const [list, count] = await Promise.all([
      this.run(() =>
        this.db.query(
          `SELECT ${SELECT_COLUMNS}
           FROM short_urls
           WHERE created_by = $1
           ORDER BY created_at DESC, id
           OFFSET $2 LIMIT $3`,
          [ownerId, page.skip, page.take]
        )
      ),
      this.run(() => this.db.query("SELECT COUNT(*) AS total FROM short_urls WHERE created_by = $1", [ownerId])),
    ]);
    return {
      items: list.rows.map((row) => decodeShortUrlRow(row)),
      total: Number(count.rows[0]?.total ?? 0),
    };
  }

  async findExpiredCodes(now: Date, limit: number): Promise<string[]> {
    const { rows } = await this.run(() =>
      this.db.query(
        `SELECT short_code
         FROM short_urls
         WHERE status = $1
           AND expires_at IS NOT NULL
           AND expires_at <= $2
         ORDER BY expires_at
         LIMIT $3`,
        [ShortUrlStatus.ACTIVE, now, limit]
      )
    );
    return rows.flatMap((row) => (typeof row.short_code === "string" ? [row.short_code] : []));
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.query("SELECT 1");
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "PostgreSQL ping failed");
      return false;
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async lockAtVersion(tx: Queryable, aggregate: ShortUrlAggregate, expectedVersion: number): Promise<void> {
    const { rows } = await tx.query(
      "SELECT version FROM short_urls WHERE id = $1 FOR UPDATE",
      [aggregate.id]
    );
    const current = rows[0]?.version ?? 0;
    if (current !== expectedVersion) {
      this.logger.warn(
        { shortCode: aggregate.shortCode, expectedVersion, currentVersion: current },
        "Version mismatch on save"
      );
      throw new ConflictError("version_mismatch", aggregate.shortCode);
    }
  }

  private mapWriteError(error: unknown, shortCode: string): unknown {
    if (error instanceof ConflictError) return error;

    const { code, constraint } = pgErrorFields(error);
    if (code === UNIQUE_VIOLATION) {
      return constraint === SHORT_CODE_CONSTRAINT
        ? new ConflictError("short_code_taken", shortCode)
        : new ConflictError("version_mismatch", shortCode);
    }
    if (isTransientDbError(error)) {
      return new TransientInfrastructureError("store", "PostgreSQL write failed", error);
    }
    return error;
  }

  private async run<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      if (isTransientDbError(error)) {
        throw new TransientInfrastructureError("store", "PostgreSQL query failed", error);
      }
      throw error;
    }
  }
}
