import { systemClock, type Clock } from "@/channels/channelSender";
import type { BatchProgressInput, BatchProgressStore } from "@/services/bulk/progress.service";
import { fillPlaceholders } from "@/services/bulk/template";
import type { NotificationService } from "@/services/notification/notification.service";
import type { BatchProgressSnapshot, BatchRecipient, BatchTally, QueueBatch } from "@/types/batch";
import { prioritySchema, type NotificationRequest, type Priority } from "@/types/notification";
import type { QueueBatchStore } from "@/types/stores";
import { errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { sleep } from "@/utils/sleep";

const DEFAULT_TITLE = "Notification";
const DEFAULT_PRIORITY: Priority = "normal";
const DEFAULT_PROGRESS_TIMEOUT_MS = 2_000;
const DEFAULT_LEASE_MS = 300_000;

export interface BulkQueueProcessorDeps {
  notifications: Pick<NotificationService, "sendNotification">;
  batches: QueueBatchStore;
  progress: BatchProgressStore;
  /** Upper bound on one progress write; the fan-out does not wait longer than this. */
  progressTimeoutMs?: number;
  /** Batch lease length; the fan-out renews it once half has elapsed. */
  leaseMs?: number;
  clock?: Clock;
}

function contextString(context: Record<string, unknown>, key: string): string | undefined {
  const value = context[key];
  return typeof value === "string" ? value : undefined;
}

function contextPriority(context: Record<string, unknown>): Priority | undefined {
  const parsed = prioritySchema.safeParse(context.priority);
  return parsed.success ? parsed.data : undefined;
}

export function buildRecipientRequest(batch: QueueBatch, recipient: BatchRecipient & { userId: string }): NotificationRequest {
  const metadata = { ...batch.context, ...recipient.metadata };
  const title = recipient.title ?? contextString(batch.context, "title") ?? DEFAULT_TITLE;
  const message = recipient.message ?? contextString(batch.context, "message") ?? "";

  return {
    userId: recipient.userId,
    title: fillPlaceholders(title, metadata),
    message: fillPlaceholders(message, metadata),
    channels: [batch.channel],
    priority: recipient.priority ?? contextPriority(batch.context) ?? DEFAULT_PRIORITY,
    eventType: batch.eventType ?? undefined,
    metadata,
  };
}

export class BulkQueueProcessor {
  private readonly clock: Clock;
  private readonly progressTimeoutMs: number;
  private readonly leaseMs: number;

  constructor(private readonly deps: BulkQueueProcessorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.progressTimeoutMs = deps.progressTimeoutMs ?? DEFAULT_PROGRESS_TIMEOUT_MS;
    this.leaseMs = deps.leaseMs ?? DEFAULT_LEASE_MS;
  }

  getProgress(batchId: string): Promise<BatchProgressSnapshot | null> {
    return this.deps.progress.read(batchId);
  }

  /**
   * Fans a batch out to its recipients one at a time. Recipient failures are
   * tallied; an error outside the per-recipient handling fails the batch and
   * is rethrown.
   */
  async process(batch: QueueBatch): Promise<BatchTally> {
    const tally: BatchTally = { successCount: 0, failureCount: 0 };
    const total = batch.recipients.length;
    let processed = 0;

    logger.info("Batch processing started", { batchId: batch.id, channel: batch.channel, recipientCount: total });

    try {
      let leaseRenewedAt = this.clock();
      if (batch.status !== "processing") {
        const claimed = await this.deps.batches.markProcessing(batch.id, leaseRenewedAt, this.leaseUntil(leaseRenewedAt));
        if (!claimed) {
          logger.warn("Batch is no longer pending, skipping", { batchId: batch.id, status: batch.status });
          return tally;
        }
      }

      for (const recipient of batch.recipients) {
        const renewedAt = await this.keepLease(batch.id, leaseRenewedAt);
        if (!renewedAt) {
          logger.warn("Batch left processing during fan-out, stopping", { batchId: batch.id, processed });
          return tally;
        }
        leaseRenewedAt = renewedAt;

        if (await this.deliverToRecipient(batch, recipient)) {
          tally.successCount += 1;
        } else {
          tally.failureCount += 1;
        }

        processed += 1;
        await this.reportProgress({ batchId: batch.id, status: "processing", processed, total, ...tally });
      }

      await this.deps.batches.markCompleted(batch.id, tally, this.clock());
      await this.reportProgress({ batchId: batch.id, status: "completed", processed, total, ...tally });

      logger.info("Batch processing completed", { batchId: batch.id, ...tally });
      return tally;
    } catch (error) {
      const message = errorMessage(error);
      logger.error("Batch processing failed", { batchId: batch.id, processed, error });

      try {
        await this.deps.batches.markFailed(batch.id, message, tally, this.clock());
      } catch (markError) {
        logger.error("Failed to mark batch as failed", { batchId: batch.id, error: markError });
      }

      await this.reportProgress({ batchId: batch.id, status: "failed", processed, total, ...tally, error: message });
      throw error;
    }
  }

  private leaseUntil(at: Date): Date {
    return new Date(at.getTime() + this.leaseMs);
  }

  /** Renews the lease once half of it has elapsed; null when the batch is no longer processing. */
  private async keepLease(batchId: string, renewedAt: Date): Promise<Date | null> {
    const now = this.clock();
    if (now.getTime() - renewedAt.getTime() < this.leaseMs / 2) {
      return renewedAt;
    }

    const renewed = await this.deps.batches.markProcessing(batchId, now, this.leaseUntil(now));
    return renewed ? now : null;
  }

  private async deliverToRecipient(batch: QueueBatch, recipient: BatchRecipient): Promise<boolean> {
    const { userId } = recipient;
    if (!userId) {
      logger.warn("Batch recipient has no user id", { batchId: batch.id });
      return false;
    }

    try {
      const result = await this.deps.notifications.sendNotification(buildRecipientRequest(batch, { ...recipient, userId }));
      if (!result.success) {
        logger.warn("Batch recipient notification rejected", { batchId: batch.id, userId, error: result.error });
        return false;
      }

      const outcomes = Object.values(result.results);
      return outcomes.length > 0 && outcomes.every((outcome) => outcome?.success === true);
    } catch (error) {
      logger.error("Batch recipient notification failed", { batchId: batch.id, userId, error });
      return false;
    }
  }

  private async reportProgress(snapshot: BatchProgressInput) {
    const timeout = new AbortController();

    try {
      const outcome = await Promise.race([
        this.deps.progress.save({ ...snapshot, updatedAt: this.clock().toISOString() }).then(() => "saved" as const),
        sleep(this.progressTimeoutMs, timeout.signal).then(() => "timed-out" as const),
      ]);

      if (outcome === "timed-out") {
        logger.warn("Batch progress write timed out", {
          batchId: snapshot.batchId,
          timeoutMs: this.progressTimeoutMs,
        });
      }
    } catch (error) {
      logger.warn("Failed to report batch progress", { batchId: snapshot.batchId, error });
    } finally {
      timeout.abort();
    }
  }
}
