import { systemClock, type ChannelSenderRegistry, type Clock } from "@/channels/channelSender";
import { createChannelSenders } from "@/channels";
import { createChannelProviders } from "@/channels/providers";
import type { ChannelProviders } from "@/channels/providers/types";
import type { AppConfig } from "@/config/config";
import { pgNotificationRecordStore } from "@/repositories/notificationRecord.repository";
import { pgPreferenceStore } from "@/repositories/preference.repository";
import { pgQueueBatchStore } from "@/repositories/queueBatch.repository";
import { pgUserDirectory } from "@/repositories/user.repository";
import { BulkQueueProcessor } from "@/services/bulk/bulkQueue.processor";
import { redisBatchProgressStore, type BatchProgressStore } from "@/services/bulk/progress.service";
import { ChannelDispatcher } from "@/services/notification/channelDispatcher";
import { NotificationService } from "@/services/notification/notification.service";
import { PreferenceResolver } from "@/services/preferences/preferenceResolver";
import { BackgroundProcessor } from "@/services/worker/backgroundProcessor";
import type { NotificationRecordStore, PreferenceStore, QueueBatchStore } from "@/types/stores";
import type { EntitySummaryRenderer, UserDirectory } from "@/types/user";
import { logger } from "@/utils/logger";

export interface NotificationEngineOverrides {
  records?: NotificationRecordStore;
  preferences?: PreferenceStore;
  batches?: QueueBatchStore;
  users?: UserDirectory;
  progress?: BatchProgressStore;
  providers?: ChannelProviders;
  senders?: ChannelSenderRegistry;
  entitySummary?: EntitySummaryRenderer;
  clock?: Clock;
}

/** Builds one of each component and owns the lifecycle of the background worker. */
export class NotificationEngine {
  readonly resolver: PreferenceResolver;
  readonly dispatcher: ChannelDispatcher;
  readonly notifications: NotificationService;
  readonly bulk: BulkQueueProcessor;
  readonly worker: BackgroundProcessor;

  constructor(cfg: AppConfig, overrides: NotificationEngineOverrides = {}) {
    const clock = overrides.clock ?? systemClock;
    const records = overrides.records ?? pgNotificationRecordStore;
    const preferences = overrides.preferences ?? pgPreferenceStore;
    const batches = overrides.batches ?? pgQueueBatchStore;
    const users = overrides.users ?? pgUserDirectory;

    const senders =
      overrides.senders ??
      createChannelSenders({
        providers: overrides.providers ?? createChannelProviders(cfg),
        emailFrom: cfg.email.defaultSender,
        productName: cfg.email.productName,
        smsFromNumber: cfg.sms.fromNumber,
        entitySummary: overrides.entitySummary,
        clock,
      });

    this.resolver = new PreferenceResolver(preferences, cfg.quietHours.timeZone);
    this.dispatcher = new ChannelDispatcher({ senders, records, preferences, clock });
    this.notifications = new NotificationService({
      users,
      records,
      batches,
      resolver: this.resolver,
      dispatcher: this.dispatcher,
      leaseMs: cfg.worker.leaseMs,
      clock,
    });
    this.bulk = new BulkQueueProcessor({
      notifications: this.notifications,
      batches,
      progress: overrides.progress ?? redisBatchProgressStore,
      leaseMs: cfg.worker.leaseMs,
      clock,
    });
    this.worker = new BackgroundProcessor({
      records,
      batches,
      users,
      dispatcher: this.dispatcher,
      bulk: this.bulk,
      options: { ...cfg.worker },
      clock,
    });
  }

  start() {
    this.worker.start();
  }

  async stop(timeoutMs?: number) {
    const stopped = await this.worker.stop(timeoutMs);
    if (!stopped) {
      logger.warn("Notification engine stopped before the worker finished its iteration");
    }
  }
}
