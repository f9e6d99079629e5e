import { systemClock, type ChannelSender, type Clock, type SendContext } from "@/channels/channelSender";
import type { PushProvider } from "@/channels/providers/types";
import type { SenderResult } from "@/types/notification";
import { ChannelUnavailableError } from "@/utils/errors";

interface PushSenderOptions {
  provider: PushProvider | null;
  clock?: Clock;
}

export class PushSender implements ChannelSender {
  readonly channel = "push" as const;

  private readonly clock: Clock;

  constructor(private readonly options: PushSenderOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async send({ record, user, getPreference }: SendContext): Promise<SenderResult> {
    const { provider } = this.options;
    if (!provider) {
      throw new ChannelUnavailableError("Push service not configured", { channel: this.channel });
    }

    const preference = await getPreference();
    if (!preference.pushToken) {
      throw new ChannelUnavailableError("No push token for user", { channel: this.channel, userId: user.id });
    }

    const result = await provider.send({
      token: preference.pushToken,
      title: record.title,
      body: record.message,
      data: {
        notificationId: record.id,
        eventType: record.eventType ?? "",
        relatedEntityId: record.relatedEntityId ?? "",
      },
    });

    if (!result.success) {
      return {
        success: false,
        status: "failed",
        error: result.error,
        details: result.statusCode === undefined ? { error: result.error } : { error: result.error, statusCode: result.statusCode },
      };
    }

    return {
      success: true,
      status: "delivered",
      details: {
        messageId: result.messageId,
        sentAt: this.clock().toISOString(),
      },
    };
  }
}
