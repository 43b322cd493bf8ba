import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

/**
 * Create the checkpoint table if it does not exist yet
 */
export async function runMigration(db: Kysely<Database>): Promise<void> {
  dbLogger.info("Running checkpoint schema migration...");

  await db.schema
    .createTable("sync_checkpoints")
    .ifNotExists()
    .addColumn("name", "text", (col) => col.primaryKey())
    .addColumn("last_sync_at", "timestamptz", (col) => col.notNull())
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  dbLogger.info("Schema migration completed successfully");
}
