import { systemClock, type ChannelSenderRegistry, type Clock } from "@/channels/channelSender";
import type { DeliveryResult, NotificationRecord, SenderResult } from "@/types/notification";
import type { UserChannelPreference } from "@/types/preference";
import type { NotificationRecordStore, PreferenceStore } from "@/types/stores";
import type { User } from "@/types/user";
import { AppError, errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";

interface ChannelDispatcherDeps {
  senders: ChannelSenderRegistry;
  records: NotificationRecordStore;
  preferences: PreferenceStore;
  clock?: Clock;
}

function failureFromError(error: unknown): SenderResult {
  return {
    success: false,
    status: "failed",
    error: errorMessage(error),
    details: error instanceof AppError ? { code: error.code } : undefined,
  };
}

export class ChannelDispatcher {
  private readonly clock: Clock;

  constructor(private readonly deps: ChannelDispatcherDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Sends one record through the sender registered for its channel and stores
   * the outcome. Never throws: every failure comes back as a failed result.
   */
  async deliver(record: NotificationRecord, user: User): Promise<DeliveryResult> {
    const outcome = await this.send(record, user);
    return this.persist(record, outcome);
  }

  private async send(record: NotificationRecord, user: User): Promise<SenderResult> {
    const sender = this.deps.senders[record.channel];
    if (!sender) {
      logger.warn("No sender registered for channel", { notificationId: record.id, channel: record.channel });
      return { success: false, status: "failed", error: `Unknown channel: ${record.channel}` };
    }

    let preference: Promise<UserChannelPreference> | null = null;
    const getPreference = () => {
      preference ??= this.deps.preferences.getOrCreate(user.id);
      return preference;
    };

    try {
      return await sender.send({ record, user, getPreference });
    } catch (error) {
      logger.error("Channel sender failed", {
        notificationId: record.id,
        channel: record.channel,
        userId: user.id,
        error,
      });
      return failureFromError(error);
    }
  }

  private async persist(record: NotificationRecord, outcome: SenderResult): Promise<DeliveryResult> {
    try {
      const updated = await this.deps.records.recordOutcome(record.id, {
        status: outcome.status,
        at: this.clock(),
        failureReason: outcome.success ? null : outcome.error,
        deliveryDetails: outcome.details ?? null,
      });

      if (!updated) {
        logger.warn("Delivery outcome not applied; record already left a dispatchable status", {
          notificationId: record.id,
          status: outcome.status,
        });
      }
    } catch (error) {
      logger.error("Failed to store delivery outcome", { notificationId: record.id, error });
      return {
        success: false,
        status: "failed",
        notificationId: record.id,
        error: `Failed to store delivery outcome: ${errorMessage(error)}`,
      };
    }

    if (outcome.success) {
      return { success: true, status: outcome.status, notificationId: record.id, details: outcome.details };
    }

    return {
      success: false,
      status: "failed",
      notificationId: record.id,
      error: outcome.error,
      details: outcome.details,
    };
  }
}
