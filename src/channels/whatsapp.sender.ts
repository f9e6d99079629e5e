import { systemClock, type ChannelSender, type Clock, type SendContext } from "@/channels/channelSender";
import type { WhatsAppProvider } from "@/channels/providers/types";
import type { NotificationRecord, SenderResult } from "@/types/notification";
import { ChannelUnavailableError } from "@/utils/errors";

interface WhatsAppSenderOptions {
  provider: WhatsAppProvider | null;
  clock?: Clock;
}

export function formatWhatsAppText(record: Pick<NotificationRecord, "title" | "message">): string {
  return `*${record.title}*\n\n${record.message}`;
}

export class WhatsAppSender implements ChannelSender {
  readonly channel = "whatsapp" as const;

  private readonly clock: Clock;

  constructor(private readonly options: WhatsAppSenderOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async send({ record, user, getPreference }: SendContext): Promise<SenderResult> {
    const { provider } = this.options;
    if (!provider) {
      throw new ChannelUnavailableError("WhatsApp service not configured", { channel: this.channel });
    }

    // The contact stored on the user wins over the one saved in notification settings.
    const recipient = user.whatsappNumber?.trim() || (await getPreference()).whatsappPhone?.trim();
    if (!recipient) {
      throw new ChannelUnavailableError("No WhatsApp number for user", { channel: this.channel, userId: user.id });
    }

    const result = await provider.sendMessage(recipient, formatWhatsAppText(record));
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
      status: "sent",
      details: {
        recipient,
        messageId: result.messageId,
        sentAt: this.clock().toISOString(),
      },
    };
  }
}
