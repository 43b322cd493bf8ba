import { createSyncService } from "../../app.js";
import { loadConfig } from "../../config.js";
import { logger } from "../../logger.js";
import { startStatusServer } from "../../server/index.js";

import type { Command } from "commander";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Run Command
// ============================================================================

export function registerRunCommand(program: Command): void {
  program
    .command("run", { isDefault: true })
    .description("Run the sync loop until interrupted (default)")
    .action(async () => {
      const config = loadConfig();
      const service = createSyncService(config);
      let server: FastifyInstance | null = null;

      const shutdown = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, "Shutdown requested, finishing current cycle");
        service.scheduler.stop();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);

      try {
        if (config.statusServer !== null) {
          server = await startStatusServer(
            service.scheduler,
            config.statusServer
          );
        }
        await service.scheduler.run();
      } finally {
        await server?.close();
        await service.close();
      }
    });
}
