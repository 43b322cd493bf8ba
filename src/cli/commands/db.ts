import ora from "ora";

import {
  closeDatabase,
  createDatabase,
  maskDatabaseUrl,
} from "../../db/connection.js";
import { runMigration } from "../../db/migrate.js";
import { describeError } from "../../errors.js";
import { PostgresCheckpointStore } from "../../services/sync/checkpoints.js";
import { printError } from "../utils/display.js";

import type { Command } from "commander";

function requireDatabaseUrl(): string | null {
  const url = process.env.DATABASE_URL;
  if (url === undefined || url.trim() === "") {
    printError("DATABASE_URL is not set; the checkpoint is kept in memory");
    process.exitCode = 1;
    return null;
  }
  return url.trim();
}

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program
    .command("db")
    .description("Manage the optional Postgres checkpoint store");

  // db migrate
  db.command("migrate")
    .description("Create the sync_checkpoints table")
    .action(async () => {
      const url = requireDatabaseUrl();
      if (url === null) {
        return;
      }

      const { db: database } = createDatabase(url);
      const spinner = ora("Running migration...").start();

      try {
        await runMigration(database);
        spinner.succeed(`Migration completed on ${maskDatabaseUrl(url)}`);
      } catch (error) {
        spinner.fail(`Migration failed: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeDatabase(database);
      }
    });

  // db status
  db.command("status")
    .description("Show the stored last sync marker")
    .action(async () => {
      const url = requireDatabaseUrl();
      if (url === null) {
        return;
      }

      const { db: database } = createDatabase(url);
      const spinner = ora("Reading checkpoint...").start();

      try {
        const lastSync = await new PostgresCheckpointStore(
          database
        ).getLastSync();
        spinner.succeed(`Connected to ${maskDatabaseUrl(url)}`);
        console.log(
          `\nLast sync: ${lastSync !== null ? lastSync.toISOString() : "Never"}`
        );
      } catch (error) {
        spinner.fail(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeDatabase(database);
      }
    });
}
