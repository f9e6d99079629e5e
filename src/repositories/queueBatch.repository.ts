import { parseJsonObject, runQuery } from "@/database/query";
import {
  batchRecipientSchema,
  batchStatusSchema,
  type BatchRecipient,
  type BatchStatus,
  type BatchTally,
  type QueueBatch,
} from "@/types/batch";
import { channelSchema } from "@/types/notification";
import type { ClaimDueOptions, CreateQueueBatchInput, QueueBatchStore } from "@/types/stores";

type QueueBatchRow = {
  id: string;
  channel: string;
  event_type: string | null;
  recipients: unknown;
  context: unknown;
  status: string;
  success_count: number;
  failure_count: number;
  scheduled_for: Date;
  error_message: string | null;
  started_at: Date | null;
  lease_expires_at: Date | null;
  completed_at: Date | null;
  created_at: Date;
};

const BATCH_COLUMNS = `id, channel, event_type, recipients, context, status, success_count, failure_count,
  scheduled_for, error_message, started_at, lease_expires_at, completed_at, created_at`;

// A malformed entry keeps its slot as an empty recipient so it is tallied as a failure.
function parseRecipients(value: unknown): BatchRecipient[] {
  let raw: unknown = value;
  if (typeof value === "string") {
    try {
      raw = JSON.parse(value);
    } catch {
      return [];
    }
  }

  if (!Array.isArray(raw)) {
    return [];
  }

  return raw.map((entry: unknown) => {
    const parsed = batchRecipientSchema.safeParse(entry);
    return parsed.success ? parsed.data : {};
  });
}

export function mapBatchRow(row: QueueBatchRow): QueueBatch {
  return {
    id: row.id,
    channel: channelSchema.parse(row.channel),
    eventType: row.event_type,
    recipients: parseRecipients(row.recipients),
    context: parseJsonObject(row.context) ?? {},
    status: batchStatusSchema.parse(row.status),
    successCount: row.success_count,
    failureCount: row.failure_count,
    scheduledFor: row.scheduled_for,
    errorMessage: row.error_message,
    startedAt: row.started_at,
    leaseExpiresAt: row.lease_expires_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
  };
}

async function create(input: CreateQueueBatchInput): Promise<QueueBatch> {
  const result = await runQuery<QueueBatchRow>(
    "create queue batch",
    `INSERT INTO queue_batches (channel, event_type, recipients, context, status, scheduled_for)
     VALUES ($1, $2, $3, $4, 'pending', $5)
     RETURNING ${BATCH_COLUMNS}`,
    [input.channel, input.eventType, JSON.stringify(input.recipients), JSON.stringify(input.context), input.scheduledFor],
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error("Queue batch insert returned no row");
  }

  return mapBatchRow(row);
}

async function claimDue({ now, leaseMs, limit }: ClaimDueOptions): Promise<QueueBatch[]> {
  const leaseExpiresAt = new Date(now.getTime() + leaseMs);
  const result = await runQuery<QueueBatchRow>(
    "claim due queue batches",
    `UPDATE queue_batches
     SET status = 'processing', started_at = COALESCE(started_at, $1), lease_expires_at = $2
     WHERE id IN (
       SELECT id FROM queue_batches
       WHERE (status = 'pending' AND scheduled_for <= $1)
          OR (status = 'processing' AND (lease_expires_at IS NULL OR lease_expires_at <= $1))
       ORDER BY scheduled_for ASC
       LIMIT $3
       FOR UPDATE SKIP LOCKED
     )
     RETURNING ${BATCH_COLUMNS}`,
    [now, leaseExpiresAt, limit],
  );

  return result.rows
    .map(mapBatchRow)
    .sort((left, right) => left.scheduledFor.getTime() - right.scheduledFor.getTime());
}

async function markProcessing(id: string, at: Date, leaseExpiresAt: Date): Promise<QueueBatch | null> {
  const result = await runQuery<QueueBatchRow>(
    "mark queue batch processing",
    `UPDATE queue_batches
     SET status = 'processing', started_at = COALESCE(started_at, $2), lease_expires_at = $3
     WHERE id = $1 AND status IN ('pending', 'processing')
     RETURNING ${BATCH_COLUMNS}`,
    [id, at, leaseExpiresAt],
  );

  const row = result.rows[0];
  return row ? mapBatchRow(row) : null;
}

async function markCompleted(id: string, tally: BatchTally, at: Date): Promise<QueueBatch | null> {
  const result = await runQuery<QueueBatchRow>(
    "mark queue batch completed",
    `UPDATE queue_batches
     SET status = 'completed', success_count = $2, failure_count = $3, completed_at = $4, lease_expires_at = NULL
     WHERE id = $1 AND status = 'processing'
     RETURNING ${BATCH_COLUMNS}`,
    [id, tally.successCount, tally.failureCount, at],
  );

  const row = result.rows[0];
  return row ? mapBatchRow(row) : null;
}

async function markFailed(id: string, errorMessage: string, tally: BatchTally, at: Date): Promise<QueueBatch | null> {
  const result = await runQuery<QueueBatchRow>(
    "mark queue batch failed",
    `UPDATE queue_batches
     SET status = 'failed', error_message = $2, success_count = $3, failure_count = $4, completed_at = $5,
         lease_expires_at = NULL
     WHERE id = $1 AND status IN ('pending', 'processing')
     RETURNING ${BATCH_COLUMNS}`,
    [id, errorMessage, tally.successCount, tally.failureCount, at],
  );

  const row = result.rows[0];
  return row ? mapBatchRow(row) : null;
}

async function countByStatus(status: BatchStatus): Promise<number> {
  const result = await runQuery<{ count: number }>(
    "count queue batches",
    `SELECT COUNT(*)::int AS count FROM queue_batches WHERE status = $1`,
    [status],
  );

  return result.rows[0]?.count ?? 0;
}

export const pgQueueBatchStore: QueueBatchStore = {
  create,
  claimDue,
  markProcessing,
  markCompleted,
  markFailed,
  countByStatus,
};
