#!/usr/bin/env node

/**
 * Paperless-Notion Sync CLI
 *
 * Mirrors Paperless-ngx documents, tags and correspondents into Notion.
 * Started without a command, it runs the sync loop.
 */

import { Command } from "commander";

import { ConfigError, describeError } from "../errors.js";
import { logger } from "../logger.js";
import { registerDbCommand } from "./commands/db.js";
import { registerRunCommand } from "./commands/run.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("paperless-notion-sync")
  .description("Mirror Paperless-ngx into Notion databases")
  .version("0.1.0");

// Register all commands
registerRunCommand(program);
registerSyncCommand(program);
registerDbCommand(program);

try {
  await program.parseAsync();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, "Invalid configuration");
  } else {
    logger.fatal({ error: describeError(error) }, "Unrecoverable error");
  }
  process.exitCode = 1;
}
