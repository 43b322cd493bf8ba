import type { Generated } from "kysely";

// ============================================================================
// Tables
// ============================================================================

/**
 * Last successful sync marker, one row per named sync stream
 */
export interface SyncCheckpointsTable {
  name: string;
  last_sync_at: Date;
  updated_at: Generated<Date>;
}

export interface Database {
  sync_checkpoints: SyncCheckpointsTable;
}
