/**
 * Status Routes Registration
 */

import {
  HealthResponseSchema,
  StatusResponseSchema,
  type CycleSummary,
  type StatusResponse,
} from "../schemas/status.js";

import type { CycleResult } from "../../services/sync/reconciler.js";
import type { SchedulerStatus } from "../../services/sync/scheduler.js";
import type { FastifyInstance } from "fastify";

export interface StatusSource {
  getStatus(): SchedulerStatus;
}

function toCycleSummary(cycle: CycleResult): CycleSummary {
  return {
    ...cycle,
    startedAt: cycle.startedAt.toISOString(),
    finishedAt: cycle.finishedAt.toISOString(),
  };
}

export function toStatusResponse(status: SchedulerStatus): StatusResponse {
  return {
    running: status.running,
    lastSyncAt: status.lastSyncAt,
    nextRunAt: status.nextRunAt,
    lastError: status.lastError,
    lastCycle: status.lastCycle !== null ? toCycleSummary(status.lastCycle) : null,
  };
}

/**
 * Register the health and sync status routes
 */
export function registerStatusRoutes(
  app: FastifyInstance,
  source: StatusSource
): void {
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns ok while the process is up",
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  app.get(
    "/status",
    {
      schema: {
        summary: "Sync status",
        description: "Last completed cycle, last error and next scheduled run",
        response: {
          200: StatusResponseSchema,
        },
      },
    },
    () => toStatusResponse(source.getStatus())
  );
}
