import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool } = pg;

export interface DatabaseConnection {
  db: Kysely<Database>;
  pool: pg.Pool;
}

/**
 * Open a pooled Kysely connection. Nothing connects until the first query.
 */
export function createDatabase(connectionString: string): DatabaseConnection {
  const pool = new Pool({
    connectionString,
    max: 2, // the sync runs one query at a time
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5000,
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return { db, pool };
}

/**
 * Gracefully close the database connection
 */
export async function closeDatabase(db: Kysely<Database>): Promise<void> {
  try {
    // db.destroy() already closes the pool
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get a database URL for display, with the password masked
 */
export function maskDatabaseUrl(connectionString: string): string {
  const url = new URL(connectionString);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}
