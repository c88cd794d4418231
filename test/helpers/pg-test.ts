/**
 * pg-test.ts — In-memory PostgreSQL for Vitest.
 *
 * Each call to createTestDatabase() returns a fresh pg-mem instance with the
 * uuid-ossp extension registered, plus a factory for pg-compatible pools.
 * Nothing leaves the process.
 */

import { randomUUID } from "node:crypto";
import { DataType, newDb, type IMemoryDb } from "pg-mem";
import type { Pool } from "../../src/server/db.js";

export interface TestDatabase {
  db: IMemoryDb;
  /** pg.Pool-compatible constructor bound to this database. */
  PoolClass: new () => Pool;
  createPool(): Pool;
}

export function createTestDatabase(): TestDatabase {
  // Repeated `CREATE TABLE IF NOT EXISTS` trips the AST coverage check.
  const db = newDb({ noAstCoverageCheck: true });

  let registered = false;
  db.registerExtension("uuid-ossp", (schema) => {
    if (registered) return;
    registered = true;
    schema.registerFunction({
      name: "uuid_generate_v4",
      returns: DataType.uuid,
      implementation: randomUUID,
      impure: true,
    });
  });

  const { Pool: PoolClass } = db.adapters.createPg();
  return {
    db,
    PoolClass,
    createPool: () => new PoolClass(),
  };
}

/** Read every device row straight from the table, bypassing the store. */
export async function countDevices(pool: Pool, serialNumber: string): Promise<number> {
  const res = await pool.query<{ n: number }>(
    "SELECT COUNT(*)::int AS n FROM devices WHERE serial_number = $1",
    [serialNumber],
  );
  return res.rows[0]?.n ?? 0;
}

export type { Pool };
