import { setTimeout as delay } from "node:timers/promises";

import { describeError } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { CheckpointStore } from "./checkpoints.js";
import type { CycleResult, Reconciler } from "./reconciler.js";
import type { Logger } from "pino";

// ============================================================================
// Types
// ============================================================================

export type WaitFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  checkpoints: CheckpointStore;
  intervalMs: number;
  /** Cooldown after a failed cycle before the whole cycle is retried */
  retryDelayMs: number;
  wait?: WaitFn;
  logger?: Logger;
}

export interface SchedulerStatus {
  running: boolean;
  lastSyncAt: string | null;
  lastCycle: CycleResult | null;
  lastError: string | null;
  nextRunAt: string | null;
}

const abortableWait: WaitFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

// ============================================================================
// Scheduler
// ============================================================================

/**
 * Runs the reconciler on a fixed interval, one cycle at a time.
 *
 * The last sync marker is threaded through the checkpoint store and only
 * advanced after a cycle completes, so a failed cycle re-scans the same
 * window on retry.
 */
export class SyncScheduler {
  private readonly checkpoints: CheckpointStore;
  private readonly intervalMs: number;
  private readonly retryDelayMs: number;
  private readonly wait: WaitFn;
  private readonly log: Logger;
  private readonly controller = new AbortController();

  private running = false;
  private lastSyncAt: Date | null = null;
  private lastCycle: CycleResult | null = null;
  private lastError: string | null = null;
  private nextRunAt: Date | null = null;

  constructor(
    private reconciler: Reconciler,
    options: SchedulerOptions
  ) {
    this.checkpoints = options.checkpoints;
    this.intervalMs = options.intervalMs;
    this.retryDelayMs = options.retryDelayMs;
    this.wait = options.wait ?? abortableWait;
    this.log = options.logger ?? syncLogger;
  }

  /**
   * Run a single cycle and advance the marker on success
   *
   * @param options.full - ignore the stored marker and sync every document
   */
  async runOnce(options: { full?: boolean } = {}): Promise<CycleResult> {
    const lastSync =
      options.full === true ? null : await this.checkpoints.getLastSync();
    this.running = true;

    try {
      const result = await this.reconciler.runCycle(lastSync);
      await this.checkpoints.saveLastSync(result.startedAt);

      this.lastSyncAt = result.startedAt;
      this.lastCycle = result;
      this.lastError = null;
      return result;
    } catch (error) {
      this.lastError = describeError(error);
      throw error;
    } finally {
      this.running = false;
    }
  }

  /**
   * Loop until stop() is called. Failures never end the loop.
   */
  async run(): Promise<void> {
    this.log.info(
      { intervalMs: this.intervalMs, retryDelayMs: this.retryDelayMs },
      "Starting Paperless-Notion sync service"
    );

    while (!this.stopped) {
      let pauseMs: number;

      try {
        await this.runOnce();
        pauseMs = this.intervalMs;
        this.log.info(
          { nextSyncInSeconds: Math.round(pauseMs / 1000) },
          "Sync completed"
        );
      } catch (error) {
        pauseMs = this.retryDelayMs;
        this.log.error(
          {
            error: describeError(error),
            retryInSeconds: Math.round(pauseMs / 1000),
          },
          "Error during sync"
        );
      }

      if (this.stopped) {
        break;
      }

      this.nextRunAt = new Date(Date.now() + pauseMs);
      await this.wait(pauseMs, this.controller.signal);
      this.nextRunAt = null;
    }

    this.log.info("Sync service stopped");
  }

  /**
   * Stop after the current cycle; wakes a pending wait immediately
   */
  stop(): void {
    this.controller.abort();
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      lastSyncAt: this.lastSyncAt?.toISOString() ?? null,
      lastCycle: this.lastCycle,
      lastError: this.lastError,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
    };
  }
}
