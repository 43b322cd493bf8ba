import { closeDatabase, createDatabase } from "./db/connection.js";
import { logger } from "./logger.js";
import { NotionClient } from "./notion/client.js";
import { PaperlessClient } from "./paperless/client.js";
import {
  MemoryCheckpointStore,
  PostgresCheckpointStore,
  type CheckpointStore,
} from "./services/sync/checkpoints.js";
import { Reconciler } from "./services/sync/reconciler.js";
import { SyncScheduler } from "./services/sync/scheduler.js";

import type { Config } from "./config.js";

export interface SyncService {
  paperless: PaperlessClient;
  notion: NotionClient;
  reconciler: Reconciler;
  scheduler: SyncScheduler;
  checkpoints: CheckpointStore;
  close(): Promise<void>;
}

/**
 * Wire the clients, reconciler, checkpoint store and scheduler from config
 */
export function createSyncService(config: Config): SyncService {
  const paperless = new PaperlessClient({
    baseUrl: config.paperless.url,
    token: config.paperless.token,
    pageSize: config.paperless.pageSize,
  });

  const notion = new NotionClient({
    token: config.notion.token,
    databases: config.notion.databases,
  });

  const reconciler = new Reconciler(paperless, notion);

  const database =
    config.databaseUrl !== null ? createDatabase(config.databaseUrl) : null;

  const checkpoints: CheckpointStore =
    database !== null
      ? new PostgresCheckpointStore(database.db)
      : new MemoryCheckpointStore();

  logger.debug(
    { checkpoints: database !== null ? "postgres" : "memory" },
    "Checkpoint store selected"
  );

  const scheduler = new SyncScheduler(reconciler, {
    checkpoints,
    intervalMs: config.sync.intervalMs,
    retryDelayMs: config.sync.retryDelayMs,
  });

  return {
    paperless,
    notion,
    reconciler,
    scheduler,
    checkpoints,
    close: async () => {
      if (database !== null) {
        await closeDatabase(database.db);
      }
    },
  };
}
