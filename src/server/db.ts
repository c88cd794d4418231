/**
 * db.ts — PostgreSQL connection layer
 *
 * One shared pool per process. Stores receive the pool from the boot
 * sequence and never open their own.
 *
 * Pattern:
 *   const pool = createPool(url);
 *   await ping(pool);                        // throws when unreachable
 *   await initSchema(pool, statements);      // idempotent DDL
 *   await pool.end();
 */

import pg from "pg";
import { log } from "./logger.js";
const { Pool } = pg;
type Pool = pg.Pool;
type PoolClient = pg.PoolClient;
type QueryResult = pg.QueryResult;

export type { Pool, PoolClient, QueryResult };

/**
 * Create a connection pool. Opening is lazy: no connection is made until
 * the first query.
 */
export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    connectionTimeoutMillis: 5000,  // fail after 5s if no connection available
    idleTimeoutMillis: 30000,       // release idle clients after 30s
    statement_timeout: 30000,       // kill queries exceeding 30s
  });

  // Must handle pool error events — unhandled idle-client errors crash the process
  pool.on("error", (err) => {
    log.db.error({ err: err.message }, "idle client error");
  });

  return pool;
}

/** Round-trip a trivial query. Rejects with the driver error when unreachable. */
export async function ping(pool: Pool): Promise<void> {
  await pool.query("SELECT 1");
}

/**
 * Verify pool connectivity.
 * Returns true on success, false on failure.
 */
export async function healthCheck(pool: Pool): Promise<boolean> {
  try {
    await ping(pool);
    return true;
  } catch (err) {
    log.db.debug({ err: err instanceof Error ? err.message : String(err) }, "health check failed");
    return false;
  }
}

/**
 * Run a sequence of DDL statements inside a single transaction.
 */
export async function initSchema(
  pool: Pool,
  statements: readonly string[],
): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    for (const stmt of statements) {
      await client.query(stmt);
    }
    await client.query("COMMIT");
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}

/** Strip credentials from a connection URL before it reaches a log line. */
export function redactUrl(url: string): string {
  return url.replace(/\/\/.*@/, "//<redacted>@");
}
