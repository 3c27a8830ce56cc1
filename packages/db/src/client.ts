/**
 * PostgreSQL connection pool with query metrics
 *
 * Wraps a `pg` Pool behind the small `Database` interface the repositories
 * use, so tests can hand them an in-process fake.
 *
 * Connection Pooling Strategy:
 * - Development: Direct PostgreSQL connection
 * - Production: PgBouncer in transaction mode is fine; transactions hold one
 *   client for their whole duration
 *
 * Usage:
 * ```ts
 * import { createDatabase } from "@snaplink/db";
 *
 * const db = createDatabase({ connectionString: process.env.DATABASE_URL, logger });
 * const { rows } = await db.query("SELECT 1 AS ok");
 * ```
 */

import { Pool, type QueryResult } from "pg";
import type { Logger } from "@snaplink/logger";

// =============================================================================
// Types
// =============================================================================

export type QueryRow = Record<string, unknown>;

/**
 * Rows are untyped until a codec has checked them.
 */
export interface QueryOutcome {
  rows: QueryRow[];
  rowCount: number;
}

export interface Queryable {
  query(text: string, values?: readonly unknown[]): Promise<QueryOutcome>;
}

/**
 * A client checked out of the pool for the length of a transaction.
 */
export interface TransactionClient extends Queryable {
  release(error?: Error): void;
}

export interface Database extends Queryable {
  connect(): Promise<TransactionClient>;
  end(): Promise<void>;
}

export interface DatabaseOptions {
  connectionString: string;
  logger: Logger;
  /** Maximum connections in pool (default: 10) */
  max?: number;
  /** Idle connection timeout in ms (default: 30000) */
  idleTimeoutMs?: number;
  /** Connection timeout in ms (default: 5000) */
  connectTimeoutMs?: number;
  /** Server-side statement timeout in ms (default: 2000) */
  statementTimeoutMs?: number;
  /** Queries slower than this are logged (default: 100) */
  slowQueryMs?: number;
}

/**
 * Database metrics for monitoring
 */
export interface DbMetrics {
  totalQueries: number;
  slowQueries: number;
  errors: number;
  avgQueryTimeMs: number;
}

// =============================================================================
// Metrics
// =============================================================================

const metrics: DbMetrics = {
  totalQueries: 0,
  slowQueries: 0,
  errors: 0,
  avgQueryTimeMs: 0,
};

const DEFAULT_SLOW_QUERY_MS = 100;

function recordQuery(durationMs: number, slowQueryMs: number, text: string, logger: Logger): void {
  metrics.totalQueries++;
  metrics.avgQueryTimeMs =
    (metrics.avgQueryTimeMs * (metrics.totalQueries - 1) + durationMs) / metrics.totalQueries;

  if (durationMs > slowQueryMs) {
    metrics.slowQueries++;
    logger.warn({ durationMs, query: text.split("\n")[0] }, "Slow query");
  }
}

/**
 * Run `execute`, timing it and counting failures.
 */
async function timedQuery(
  execute: () => Promise<QueryResult>,
  text: string,
  slowQueryMs: number,
  logger: Logger
): Promise<QueryOutcome> {
  const start = Date.now();
  try {
    const result = await execute();
    recordQuery(Date.now() - start, slowQueryMs, text, logger);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  } catch (error) {
    metrics.errors++;
    throw error;
  }
}

// =============================================================================
// Pool
// =============================================================================

function toValues(values: readonly unknown[] | undefined): unknown[] | undefined {
  return values ? [...values] : undefined;
}

class PgDatabase implements Database {
  constructor(
    private readonly pool: Pool,
    private readonly logger: Logger,
    private readonly slowQueryMs: number
  ) {}

  query(text: string, values?: readonly unknown[]): Promise<QueryOutcome> {
    return timedQuery(() => this.pool.query(text, toValues(values)), text, this.slowQueryMs, this.logger);
  }

  async connect(): Promise<TransactionClient> {
    const client = await this.pool.connect();
    const { logger, slowQueryMs } = this;
    return {
      query: (text: string, values?: readonly unknown[]) =>
        timedQuery(() => client.query(text, toValues(values)), text, slowQueryMs, logger),
      release: (error?: Error) => client.release(error),
    };
  }

  end(): Promise<void> {
    return this.pool.end();
  }
}

/**
 * Create a pooled database handle.
 */
export function createDatabase(options: DatabaseOptions): Database {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: options.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: options.connectTimeoutMs ?? 5000,
    statement_timeout: options.statementTimeoutMs ?? 2000,
  });

  // Idle clients can error when the server restarts; without a listener the
  // process would crash.
  pool.on("error", (err) => {
    options.logger.error({ err }, "Idle PostgreSQL client error");
  });

  return new PgDatabase(pool, options.logger, options.slowQueryMs ?? DEFAULT_SLOW_QUERY_MS);
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Run `fn` inside BEGIN/COMMIT on one pooled client. Rolls back and rethrows
 * on any error.
 */
export async function transaction<T>(db: Database, fn: (tx: Queryable) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    client.release();
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
      client.release();
    } catch (rollbackError) {
      // A client that cannot roll back must not go back to the pool.
      client.release(rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError)));
    }
    throw error;
  }
}

/**
 * Check database connectivity
 */
export async function checkDbConnection(db: Queryable, logger: Pick<Logger, "warn">): Promise<boolean> {
  try {
    await db.query("SELECT 1");
    return true;
  } catch (error) {
    logger.warn({ err: error }, "Database connectivity check failed");
    return false;
  }
}

/**
 * Get database connection metrics
 */
export function getDbMetrics(): DbMetrics {
  return { ...metrics };
}

/**
 * Reset metrics (for testing)
 */
export function resetDbMetrics(): void {
  metrics.totalQueries = 0;
  metrics.slowQueries = 0;
  metrics.errors = 0;
  metrics.avgQueryTimeMs = 0;
}
