import { systemClock, type ChannelSender, type Clock, type SendContext } from "@/channels/channelSender";
import { referenceLabel } from "@/channels/labels";
import type { SmsProvider } from "@/channels/providers/types";
import type { NotificationRecord, SenderResult } from "@/types/notification";
import { ChannelUnavailableError } from "@/utils/errors";

const SMS_MESSAGE_LIMIT = 100;

interface SmsSenderOptions {
  provider: SmsProvider | null;
  fromNumber: string | null;
  clock?: Clock;
}

export function buildSmsBody(
  record: Pick<NotificationRecord, "title" | "message" | "relatedEntityId">,
  language: string,
): string {
  let body = `${record.title}\n\n${record.message.slice(0, SMS_MESSAGE_LIMIT)}`;
  if (record.message.length > SMS_MESSAGE_LIMIT) {
    body += "...";
  }

  if (record.relatedEntityId) {
    body += `\n\n${referenceLabel(language)}: ${record.relatedEntityId}`;
  }

  return body;
}

export class SmsSender implements ChannelSender {
  readonly channel = "sms" as const;

  private readonly clock: Clock;

  constructor(private readonly options: SmsSenderOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async send({ record, user }: SendContext): Promise<SenderResult> {
    const { provider, fromNumber } = this.options;
    if (!provider || !fromNumber) {
      throw new ChannelUnavailableError("SMS provider not configured", { channel: this.channel });
    }
    if (!user.phone) {
      throw new ChannelUnavailableError("No phone number for user", { channel: this.channel, userId: user.id });
    }

    const { sid } = await provider.createMessage({
      body: buildSmsBody(record, user.language),
      from: fromNumber,
      to: user.phone,
    });

    // No delivery receipt is modelled, so SMS stops at sent.
    return {
      success: true,
      status: "sent",
      details: {
        recipient: user.phone,
        messageSid: sid,
        sentAt: this.clock().toISOString(),
      },
    };
  }
}
