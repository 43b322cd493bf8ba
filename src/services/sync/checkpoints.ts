/**
 * Checkpoint stores - hold the last successful sync marker
 *
 * The marker is the start time of the last cycle that completed. By default it
 * lives in memory and is lost on restart, which makes the next cycle re-scan
 * every document. The Postgres store keeps it across restarts.
 */

import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

export const DEFAULT_CHECKPOINT_NAME = "documents";

export interface CheckpointStore {
  getLastSync(): Promise<Date | null>;
  saveLastSync(at: Date): Promise<void>;
}

// ============================================================================
// In-memory Store
// ============================================================================

export class MemoryCheckpointStore implements CheckpointStore {
  private lastSync: Date | null;

  constructor(initial: Date | null = null) {
    this.lastSync = initial;
  }

  getLastSync(): Promise<Date | null> {
    return Promise.resolve(this.lastSync);
  }

  saveLastSync(at: Date): Promise<void> {
    this.lastSync = at;
    return Promise.resolve();
  }
}

// ============================================================================
// Postgres Store
// ============================================================================

export class PostgresCheckpointStore implements CheckpointStore {
  constructor(
    private db: Kysely<Database>,
    private name: string = DEFAULT_CHECKPOINT_NAME
  ) {}

  /**
   * Get the stored marker, or null if no cycle has completed yet
   */
  async getLastSync(): Promise<Date | null> {
    const checkpoint = await this.db
      .selectFrom("sync_checkpoints")
      .select("last_sync_at")
      .where("name", "=", this.name)
      .executeTakeFirst();

    return checkpoint?.last_sync_at ?? null;
  }

  /**
   * Save the marker after a completed cycle. Uses upsert to update the
   * existing row.
   */
  async saveLastSync(at: Date): Promise<void> {
    await this.db
      .insertInto("sync_checkpoints")
      .values({ name: this.name, last_sync_at: at })
      .onConflict((oc) =>
        oc.column("name").doUpdateSet({
          last_sync_at: at,
          updated_at: new Date(),
        })
      )
      .execute();
  }
}
