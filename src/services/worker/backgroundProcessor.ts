import { systemClock, type Clock } from "@/channels/channelSender";
import type { BulkQueueProcessor } from "@/services/bulk/bulkQueue.processor";
import type { ChannelDispatcher } from "@/services/notification/channelDispatcher";
import type { NotificationRecord } from "@/types/notification";
import type { NotificationRecordStore, QueueBatchStore } from "@/types/stores";
import type { UserDirectory } from "@/types/user";
import { errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { sleep } from "@/utils/sleep";

export interface BackgroundProcessorOptions {
  pollIntervalMs: number;
  errorBackoffMs: number;
  batchLimit: number;
  scanLimit: number;
  leaseMs: number;
}

export interface BackgroundProcessorDeps {
  records: NotificationRecordStore;
  batches: QueueBatchStore;
  users: UserDirectory;
  dispatcher: ChannelDispatcher;
  bulk: Pick<BulkQueueProcessor, "process">;
  options: BackgroundProcessorOptions;
  clock?: Clock;
}

export interface ScanTally {
  processed: number;
  failed: number;
}

export interface IterationSummary {
  notifications: ScanTally;
  batches: ScanTally;
}

export class BackgroundProcessor {
  private readonly clock: Clock;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly deps: BackgroundProcessorDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  start() {
    if (this.loop) {
      logger.warn("Background processor is already running");
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal)
      .catch((error: unknown) => {
        logger.error("Background processor stopped unexpectedly", { error });
      })
      .finally(() => {
        this.loop = null;
        this.controller = null;
      });

    logger.info("Background processor started", { ...this.deps.options });
  }

  /** Aborts the loop and waits for the current iteration, up to `timeoutMs`. */
  async stop(timeoutMs = 10_000): Promise<boolean> {
    const loop = this.loop;
    if (!loop) {
      return true;
    }

    this.controller?.abort();

    const timeout = new AbortController();
    const finished = await Promise.race([
      loop.then(() => true),
      sleep(timeoutMs, timeout.signal).then(
        () => false,
        () => false,
      ),
    ]);
    timeout.abort();

    if (finished) {
      logger.info("Background processor stopped");
    } else {
      logger.warn("Background processor did not stop in time", { timeoutMs });
    }

    return finished;
  }

  /** Runs both scans once; a failed scan does not skip the other but fails the iteration. */
  async runIteration(): Promise<IterationSummary> {
    const summary: IterationSummary = {
      notifications: { processed: 0, failed: 0 },
      batches: { processed: 0, failed: 0 },
    };
    const errors: unknown[] = [];

    try {
      summary.notifications = await this.drainDueNotifications();
    } catch (error) {
      logger.error("Scheduled notification scan failed", { error });
      errors.push(error);
    }

    try {
      summary.batches = await this.drainDueBatches();
    } catch (error) {
      logger.error("Queue batch scan failed", { error });
      errors.push(error);
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, "Background iteration failed");
    }

    return summary;
  }

  private async run(signal: AbortSignal) {
    while (!signal.aborted) {
      let delay = this.deps.options.pollIntervalMs;

      try {
        const summary = await this.runIteration();
        if (summary.notifications.processed > 0 || summary.batches.processed > 0) {
          logger.info("Background iteration finished", summary);
        }
      } catch (error) {
        logger.error("Background iteration failed, backing off", {
          error: errorMessage(error),
          backoffMs: this.deps.options.errorBackoffMs,
        });
        delay = this.deps.options.errorBackoffMs;
      }

      try {
        await sleep(delay, signal);
      } catch (error) {
        if (!signal.aborted) {
          throw error;
        }
      }
    }
  }

  private async drainDueNotifications(): Promise<ScanTally> {
    const tally: ScanTally = { processed: 0, failed: 0 };
    const { scanLimit, leaseMs } = this.deps.options;

    for (;;) {
      const claimed = await this.deps.records.claimDue({ now: this.clock(), leaseMs, limit: scanLimit });

      for (const record of claimed) {
        tally.processed += 1;
        if (!(await this.dispatchRecord(record))) {
          tally.failed += 1;
        }
      }

      if (claimed.length < scanLimit) {
        return tally;
      }
    }
  }

  private async dispatchRecord(record: NotificationRecord): Promise<boolean> {
    try {
      const user = await this.deps.users.getUser(record.userId);
      if (!user) {
        await this.markFailed(record, "User not found");
        return false;
      }

      const result = await this.deps.dispatcher.deliver(record, user);
      return result.success;
    } catch (error) {
      logger.error("Scheduled notification dispatch failed", { notificationId: record.id, error });
      await this.markFailed(record, errorMessage(error));
      return false;
    }
  }

  private async markFailed(record: NotificationRecord, reason: string) {
    try {
      await this.deps.records.recordOutcome(record.id, {
        status: "failed",
        at: this.clock(),
        failureReason: reason,
        deliveryDetails: null,
      });
    } catch (error) {
      logger.error("Failed to mark notification as failed", { notificationId: record.id, reason, error });
    }
  }

  private async drainDueBatches(): Promise<ScanTally> {
    const tally: ScanTally = { processed: 0, failed: 0 };
    const { batchLimit, leaseMs } = this.deps.options;
    const batches = await this.deps.batches.claimDue({ now: this.clock(), leaseMs, limit: batchLimit });

    for (const batch of batches) {
      tally.processed += 1;
      try {
        await this.deps.bulk.process(batch);
      } catch (error) {
        tally.failed += 1;
        logger.error("Queue batch processing failed", { batchId: batch.id, error });
      }
    }

    return tally;
  }
}
