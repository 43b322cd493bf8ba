import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

const Required = Type.String({ minLength: 1 });
const PositiveInteger = Type.String({ pattern: "^[0-9]*[1-9][0-9]*$" });

/**
 * Environment variables read by the service
 */
export const EnvSchema = Type.Object({
  PAPERLESS_URL: Type.String({ pattern: "^https?://" }),
  PAPERLESS_TOKEN: Required,
  NOTION_TOKEN: Required,
  NOTION_DOCUMENTS_DB: Required,
  NOTION_TAGS_DB: Required,
  NOTION_CORRESPONDENTS_DB: Required,
  SYNC_INTERVAL: Type.Optional(PositiveInteger),
  SYNC_RETRY_DELAY: Type.Optional(PositiveInteger),
  PAPERLESS_PAGE_SIZE: Type.Optional(PositiveInteger),
  DATABASE_URL: Type.Optional(Type.String()),
  STATUS_PORT: Type.Optional(PositiveInteger),
  STATUS_HOST: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

export interface Config {
  paperless: {
    url: string;
    token: string;
    pageSize: number;
  };
  notion: {
    token: string;
    databases: {
      documents: string;
      tags: string;
      correspondents: string;
    };
  };
  sync: {
    intervalMs: number;
    retryDelayMs: number;
  };
  databaseUrl: string | null;
  statusServer: { port: number; host: string } | null;
}

const DEFAULT_SYNC_INTERVAL_SECONDS = 3600;
const DEFAULT_RETRY_DELAY_SECONDS = 60;
const DEFAULT_PAGE_SIZE = 100;

function parseInteger(value: string | undefined, fallback: number): number {
  return value !== undefined ? Number.parseInt(value, 10) : fallback;
}

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value.trim() !== "" ? value.trim() : null;
}

/**
 * Validate the environment and build the service configuration.
 *
 * Empty strings count as unset. Every problem is reported at once.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  // Treat `FOO=` lines in .env files as unset
  const candidate = Object.fromEntries(
    Object.keys(EnvSchema.properties)
      .map((key) => [key, nonEmpty(env[key])] as const)
      .filter((entry): entry is readonly [string, string] => entry[1] !== null)
  );

  if (!Value.Check(EnvSchema, candidate)) {
    const issues = [...Value.Errors(EnvSchema, candidate)].map((error) =>
      error.path === ""
        ? error.message
        : `${error.path.slice(1)}: ${error.message}`
    );
    throw new ConfigError(issues);
  }

  const statusPort = candidate.STATUS_PORT;

  return {
    paperless: {
      url: candidate.PAPERLESS_URL.replace(/\/+$/, ""),
      token: candidate.PAPERLESS_TOKEN,
      pageSize: parseInteger(candidate.PAPERLESS_PAGE_SIZE, DEFAULT_PAGE_SIZE),
    },
    notion: {
      token: candidate.NOTION_TOKEN,
      databases: {
        documents: candidate.NOTION_DOCUMENTS_DB,
        tags: candidate.NOTION_TAGS_DB,
        correspondents: candidate.NOTION_CORRESPONDENTS_DB,
      },
    },
    sync: {
      intervalMs:
        parseInteger(candidate.SYNC_INTERVAL, DEFAULT_SYNC_INTERVAL_SECONDS) *
        1000,
      retryDelayMs:
        parseInteger(candidate.SYNC_RETRY_DELAY, DEFAULT_RETRY_DELAY_SECONDS) *
        1000,
    },
    databaseUrl: candidate.DATABASE_URL ?? null,
    statusServer:
      statusPort !== undefined
        ? {
            port: Number.parseInt(statusPort, 10),
            host: candidate.STATUS_HOST ?? "0.0.0.0",
          }
        : null,
  };
}
