import ora from "ora";

import { createSyncService } from "../../app.js";
import { loadConfig } from "../../config.js";
import { describeError } from "../../errors.js";
import { displayCycleSummary } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Sync Command
// ============================================================================

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Run a single sync cycle and print a summary")
    .option("--full", "Ignore the stored marker and sync every document")
    .action(async (options: { full?: boolean }) => {
      const config = loadConfig();
      const service = createSyncService(config);
      const spinner = ora("Syncing Paperless to Notion...").start();

      service.reconciler.setProgressCallback((progress) => {
        spinner.text = `${progress.phase}: ${String(progress.current)}/${String(progress.total)} (${progress.currentItem ?? ""})`;
      });

      try {
        const result = await service.scheduler.runOnce({ full: options.full });
        const failed =
          result.correspondents.failed +
          result.tags.failed +
          result.archive.failed +
          result.documents.failed;

        if (failed > 0) {
          spinner.warn(`Sync completed with ${String(failed)} failures`);
        } else {
          spinner.succeed("Sync completed");
        }
        displayCycleSummary(result);
      } catch (error) {
        spinner.fail(`Sync failed: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await service.close();
      }
    });
}
