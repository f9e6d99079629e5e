import { affectedRows, parseJsonObject, runQuery } from "@/database/query";
import { READABLE_STATUSES, allowedSources } from "@/services/notification/stateMachine";
import {
  channelSchema,
  emptyStatusCounts,
  notificationStatusSchema,
  prioritySchema,
  type NotificationRecord,
  type NotificationStatus,
} from "@/types/notification";
import type {
  ClaimDueOptions,
  CreateNotificationRecordInput,
  DeliveryOutcomeUpdate,
  NotificationRecordStore,
} from "@/types/stores";

type NotificationRecordRow = {
  id: string;
  user_id: string;
  title: string;
  message: string;
  channel: string;
  priority: string;
  event_type: string | null;
  related_entity_id: string | null;
  status: string;
  scheduled_for: Date;
  sent_at: Date | null;
  delivered_at: Date | null;
  read_at: Date | null;
  failure_reason: string | null;
  delivery_details: unknown;
  metadata: unknown;
  lease_expires_at: Date | null;
  created_at: Date;
};

const RECORD_COLUMNS = `id, user_id, title, message, channel, priority, event_type, related_entity_id, status,
  scheduled_for, sent_at, delivered_at, read_at, failure_reason, delivery_details, metadata,
  lease_expires_at, created_at`;

export function mapRecordRow(row: NotificationRecordRow): NotificationRecord {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    message: row.message,
    channel: channelSchema.parse(row.channel),
    priority: prioritySchema.parse(row.priority),
    eventType: row.event_type,
    relatedEntityId: row.related_entity_id,
    status: notificationStatusSchema.parse(row.status),
    scheduledFor: row.scheduled_for,
    sentAt: row.sent_at,
    deliveredAt: row.delivered_at,
    readAt: row.read_at,
    failureReason: row.failure_reason,
    deliveryDetails: parseJsonObject(row.delivery_details),
    metadata: parseJsonObject(row.metadata) ?? {},
    leaseExpiresAt: row.lease_expires_at,
    createdAt: row.created_at,
  };
}

async function create(input: CreateNotificationRecordInput): Promise<NotificationRecord> {
  const result = await runQuery<NotificationRecordRow>(
    "create notification record",
    `INSERT INTO notification_records
       (user_id, title, message, channel, priority, event_type, related_entity_id, status, scheduled_for, metadata, lease_expires_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, 'pending', $8, $9, $10)
     RETURNING ${RECORD_COLUMNS}`,
    [
      input.userId,
      input.title,
      input.message,
      input.channel,
      input.priority,
      input.eventType,
      input.relatedEntityId,
      input.scheduledFor,
      JSON.stringify(input.metadata),
      input.leaseExpiresAt,
    ],
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error("Notification record insert returned no row");
  }

  return mapRecordRow(row);
}

async function findById(id: string): Promise<NotificationRecord | null> {
  const result = await runQuery<NotificationRecordRow>(
    "load notification record",
    `SELECT ${RECORD_COLUMNS} FROM notification_records WHERE id = $1`,
    [id],
  );

  const row = result.rows[0];
  return row ? mapRecordRow(row) : null;
}

async function claimDue({ now, leaseMs, limit }: ClaimDueOptions): Promise<NotificationRecord[]> {
  const leaseExpiresAt = new Date(now.getTime() + leaseMs);
  const result = await runQuery<NotificationRecordRow>(
    "claim due notification records",
    `UPDATE notification_records
     SET lease_expires_at = $2
     WHERE id IN (
       SELECT id FROM notification_records
       WHERE status = 'pending'
         AND scheduled_for <= $1
         AND (lease_expires_at IS NULL OR lease_expires_at <= $1)
       ORDER BY scheduled_for ASC
       LIMIT $3
       FOR UPDATE SKIP LOCKED
     )
     RETURNING ${RECORD_COLUMNS}`,
    [now, leaseExpiresAt, limit],
  );

  return result.rows
    .map(mapRecordRow)
    .sort((left, right) => left.scheduledFor.getTime() - right.scheduledFor.getTime());
}

async function recordOutcome(id: string, update: DeliveryOutcomeUpdate): Promise<NotificationRecord | null> {
  const result = await runQuery<NotificationRecordRow>(
    "record delivery outcome",
    `UPDATE notification_records
     SET status = $2::text,
         sent_at = CASE WHEN $2::text IN ('sent', 'delivered') THEN COALESCE(sent_at, $3) ELSE sent_at END,
         delivered_at = CASE WHEN $2::text = 'delivered' THEN $3 ELSE delivered_at END,
         failure_reason = $4,
         delivery_details = COALESCE($5::jsonb, delivery_details),
         lease_expires_at = NULL
     WHERE id = $1 AND status = ANY($6::text[])
     RETURNING ${RECORD_COLUMNS}`,
    [
      id,
      update.status,
      update.at,
      update.failureReason,
      update.deliveryDetails === null ? null : JSON.stringify(update.deliveryDetails),
      [...allowedSources(update.status)],
    ],
  );

  const row = result.rows[0];
  return row ? mapRecordRow(row) : null;
}

async function markAsRead(id: string, userId: string, at: Date): Promise<boolean> {
  const result = await runQuery(
    "mark notification as read",
    `UPDATE notification_records
     SET status = 'read', read_at = $3
     WHERE id = $1 AND user_id = $2 AND read_at IS NULL AND status = ANY($4::text[])`,
    [id, userId, at, [...READABLE_STATUSES]],
  );

  return affectedRows(result) > 0;
}

async function markAllAsRead(userId: string, at: Date): Promise<number> {
  const result = await runQuery(
    "mark all notifications as read",
    `UPDATE notification_records
     SET status = 'read', read_at = $2
     WHERE user_id = $1 AND read_at IS NULL AND status = ANY($3::text[])`,
    [userId, at, [...READABLE_STATUSES]],
  );

  return affectedRows(result);
}

async function listForUser(
  userId: string,
  options: { limit: number; offset: number; unreadOnly: boolean },
): Promise<NotificationRecord[]> {
  const params: unknown[] = [userId];
  let query = `SELECT ${RECORD_COLUMNS} FROM notification_records WHERE user_id = $1`;

  if (options.unreadOnly) {
    params.push([...READABLE_STATUSES]);
    query += ` AND read_at IS NULL AND status = ANY($${params.length}::text[])`;
  }

  params.push(options.limit);
  query += ` ORDER BY created_at DESC, id DESC LIMIT $${params.length}`;
  params.push(options.offset);
  query += ` OFFSET $${params.length}`;

  const result = await runQuery<NotificationRecordRow>("list user notifications", query, params);
  return result.rows.map(mapRecordRow);
}

async function countUnread(userId: string): Promise<number> {
  const result = await runQuery<{ count: number }>(
    "count unread notifications",
    `SELECT COUNT(*)::int AS count
     FROM notification_records
     WHERE user_id = $1 AND read_at IS NULL AND status = ANY($2::text[])`,
    [userId, [...READABLE_STATUSES]],
  );

  return result.rows[0]?.count ?? 0;
}

async function countByStatus(): Promise<Record<NotificationStatus, number>> {
  const result = await runQuery<{ status: string; count: number }>(
    "count notifications by status",
    `SELECT status, COUNT(*)::int AS count FROM notification_records GROUP BY status`,
  );

  const counts = emptyStatusCounts();

  for (const row of result.rows) {
    const status = notificationStatusSchema.safeParse(row.status);
    if (status.success) {
      counts[status.data] = row.count;
    }
  }

  return counts;
}

export const pgNotificationRecordStore: NotificationRecordStore = {
  create,
  findById,
  claimDue,
  recordOutcome,
  markAsRead,
  markAllAsRead,
  listForUser,
  countUnread,
  countByStatus,
};
