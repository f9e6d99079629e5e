import { systemClock, type Clock } from "@/channels/channelSender";
import type { ChannelDispatcher } from "@/services/notification/channelDispatcher";
import { enabledChannels, type PreferenceResolver } from "@/services/preferences/preferenceResolver";
import { submitBatchSchema, type SubmitBatchInput } from "@/types/batch";
import {
  notificationRequestSchema,
  type Channel,
  type ChannelResults,
  type DeliveryResult,
  type ListNotificationsOptions,
  type NotificationRecord,
  type NotificationRequest,
  type NotificationStatistics,
  type ParsedNotificationRequest,
  type SendNotificationSuccess,
} from "@/types/notification";
import type { NotificationRecordStore, QueueBatchStore } from "@/types/stores";
import type { User, UserDirectory } from "@/types/user";
import { NotFoundError, ValidationError, errorMessage, toFailure, type FailureResult } from "@/utils/errors";
import { logger } from "@/utils/logger";

export type SendNotificationResult = SendNotificationSuccess | FailureResult;

export interface NotificationServiceDeps {
  users: UserDirectory;
  records: NotificationRecordStore;
  batches: QueueBatchStore;
  resolver: PreferenceResolver;
  dispatcher: ChannelDispatcher;
  leaseMs: number;
  clock?: Clock;
}

const DEFAULT_LIST_LIMIT = 10;
const MAX_LIST_LIMIT = 100;

export class NotificationService {
  private readonly clock: Clock;

  constructor(private readonly deps: NotificationServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async sendNotification(request: NotificationRequest): Promise<SendNotificationResult> {
    const parsed = notificationRequestSchema.safeParse(request);
    if (!parsed.success) {
      logger.warn("Rejected notification request", { issues: parsed.error.issues });
      return toFailure(parsed.error);
    }

    try {
      return await this.send(parsed.data);
    } catch (error) {
      logger.error("Failed to send notification", { userId: parsed.data.userId, error });
      return toFailure(error);
    }
  }

  private async send(request: ParsedNotificationRequest): Promise<SendNotificationResult> {
    const user = await this.deps.users.getUser(request.userId);
    if (!user) {
      logger.warn("Notification requested for unknown user", { userId: request.userId });
      return toFailure(new NotFoundError("User not found", { userId: request.userId }));
    }

    const now = this.clock();
    const eventType = request.eventType ?? null;
    const preference = await this.deps.resolver.getPreferences(user.id);
    const candidates = request.channels ? [...new Set(request.channels)] : enabledChannels(preference, eventType);

    const accepted: Channel[] = [];
    const suppressed: Channel[] = [];
    for (const channel of candidates) {
      if (this.deps.resolver.shouldSend(preference, channel, eventType, now)) {
        accepted.push(channel);
      } else {
        suppressed.push(channel);
      }
    }

    if (suppressed.length > 0) {
      logger.info("Notification channels suppressed by preferences", {
        userId: user.id,
        eventType,
        suppressed,
      });
    }

    const results: ChannelResults = {};
    for (const channel of accepted) {
      results[channel] = await this.createAndDispatch(request, user, channel, now);
    }

    return { success: true, results, suppressed };
  }

  private async createAndDispatch(
    request: ParsedNotificationRequest,
    user: User,
    channel: Channel,
    now: Date,
  ): Promise<DeliveryResult> {
    const scheduledFor = request.scheduledFor ?? now;
    const dueNow = scheduledFor.getTime() <= now.getTime();

    let record: NotificationRecord;
    try {
      record = await this.deps.records.create({
        userId: user.id,
        title: request.title,
        message: request.message,
        channel,
        priority: request.priority,
        eventType: request.eventType ?? null,
        relatedEntityId: request.relatedEntityId ?? null,
        scheduledFor,
        metadata: request.metadata ?? {},
        leaseExpiresAt: dueNow ? new Date(now.getTime() + this.deps.leaseMs) : null,
      });
    } catch (error) {
      logger.error("Failed to create notification record", { userId: user.id, channel, error });
      return { success: false, status: "failed", error: errorMessage(error) };
    }

    if (!dueNow) {
      logger.debug("Notification scheduled", { notificationId: record.id, channel, scheduledFor });
      return { success: true, status: "scheduled", notificationId: record.id };
    }

    logger.debug("Dispatching notification", { notificationId: record.id, channel });
    return this.deps.dispatcher.deliver(record, user);
  }

  getUserNotifications(userId: string, options: ListNotificationsOptions = {}): Promise<NotificationRecord[]> {
    const limit = Math.min(Math.max(Math.trunc(options.limit ?? DEFAULT_LIST_LIMIT), 1), MAX_LIST_LIMIT);
    const offset = Math.max(Math.trunc(options.offset ?? 0), 0);

    return this.deps.records.listForUser(userId, { limit, offset, unreadOnly: options.unreadOnly ?? false });
  }

  async markAsRead(notificationId: string, userId: string): Promise<boolean> {
    const updated = await this.deps.records.markAsRead(notificationId, userId, this.clock());
    if (updated) {
      logger.debug("Notification marked as read", { notificationId, userId });
    }

    return updated;
  }

  async markAllAsRead(userId: string): Promise<number> {
    const count = await this.deps.records.markAllAsRead(userId, this.clock());
    logger.debug("Notifications marked as read", { userId, count });
    return count;
  }

  getUnreadCount(userId: string): Promise<number> {
    return this.deps.records.countUnread(userId);
  }

  async submitBatch(input: SubmitBatchInput): Promise<string> {
    const parsed = submitBatchSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid batch", parsed.error.flatten());
    }

    const batch = await this.deps.batches.create({
      channel: parsed.data.channel,
      eventType: parsed.data.eventType ?? null,
      recipients: parsed.data.recipients,
      context: parsed.data.context,
      scheduledFor: parsed.data.scheduledFor ?? this.clock(),
    });

    logger.info("Notification batch queued", {
      batchId: batch.id,
      channel: batch.channel,
      recipientCount: batch.recipients.length,
      scheduledFor: batch.scheduledFor,
    });

    return batch.id;
  }

  async getStatistics(): Promise<NotificationStatistics> {
    const [byStatus, pendingBatches] = await Promise.all([
      this.deps.records.countByStatus(),
      this.deps.batches.countByStatus("pending"),
    ]);

    const totalNotifications = Object.values(byStatus).reduce((sum, count) => sum + count, 0);
    return { totalNotifications, byStatus, pendingBatches };
  }
}
