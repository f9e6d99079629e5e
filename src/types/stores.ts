import type { BatchRecipient, BatchStatus, BatchTally, QueueBatch } from "@/types/batch";
import type {
  Channel,
  DeliveryDetails,
  DeliveryStatus,
  ListNotificationsOptions,
  NotificationRecord,
  NotificationStatus,
  Priority,
} from "@/types/notification";
import type { PreferencePatch, UserChannelPreference } from "@/types/preference";

export interface CreateNotificationRecordInput {
  userId: string;
  title: string;
  message: string;
  channel: Channel;
  priority: Priority;
  eventType: string | null;
  relatedEntityId: string | null;
  scheduledFor: Date;
  metadata: Record<string, unknown>;
  /** Set when the creator dispatches the record itself, so the worker does not claim it. */
  leaseExpiresAt: Date | null;
}

export interface DeliveryOutcomeUpdate {
  status: DeliveryStatus;
  at: Date;
  failureReason: string | null;
  deliveryDetails: DeliveryDetails | null;
}

export interface ClaimDueOptions {
  now: Date;
  leaseMs: number;
  limit: number;
}

export interface NotificationRecordStore {
  create(input: CreateNotificationRecordInput): Promise<NotificationRecord>;
  findById(id: string): Promise<NotificationRecord | null>;
  /** Atomically leases due pending records so concurrent workers never pick the same one. */
  claimDue(options: ClaimDueOptions): Promise<NotificationRecord[]>;
  /** Applies a sender outcome; returns null when the record is no longer in a status that allows it. */
  recordOutcome(id: string, update: DeliveryOutcomeUpdate): Promise<NotificationRecord | null>;
  markAsRead(id: string, userId: string, at: Date): Promise<boolean>;
  markAllAsRead(userId: string, at: Date): Promise<number>;
  listForUser(userId: string, options: Required<ListNotificationsOptions>): Promise<NotificationRecord[]>;
  countUnread(userId: string): Promise<number>;
  countByStatus(): Promise<Record<NotificationStatus, number>>;
}

export interface PreferenceStore {
  /** Insert-if-absent followed by read, in one atomic statement. */
  getOrCreate(userId: string): Promise<UserChannelPreference>;
  update(userId: string, patch: PreferencePatch): Promise<UserChannelPreference>;
}

export interface CreateQueueBatchInput {
  channel: Channel;
  eventType: string | null;
  recipients: BatchRecipient[];
  context: Record<string, unknown>;
  scheduledFor: Date;
}

export interface QueueBatchStore {
  create(input: CreateQueueBatchInput): Promise<QueueBatch>;
  /**
   * Moves up to `limit` due pending batches, and processing batches whose lease expired, to processing
   * under a fresh lease and returns them.
   */
  claimDue(options: ClaimDueOptions): Promise<QueueBatch[]>;
  /** Moves a pending batch to processing, or renews the lease of one already processing. */
  markProcessing(id: string, at: Date, leaseExpiresAt: Date): Promise<QueueBatch | null>;
  markCompleted(id: string, tally: BatchTally, at: Date): Promise<QueueBatch | null>;
  markFailed(id: string, errorMessage: string, tally: BatchTally, at: Date): Promise<QueueBatch | null>;
  countByStatus(status: BatchStatus): Promise<number>;
}
