import { systemClock, type ChannelSender, type Clock, type SendContext } from "@/channels/channelSender";
import { renderEmailHtml } from "@/channels/emailTemplate";
import type { EmailTransport } from "@/channels/providers/types";
import type { SenderResult } from "@/types/notification";
import type { EntitySummaryRenderer } from "@/types/user";
import { ChannelUnavailableError } from "@/utils/errors";
import { logger } from "@/utils/logger";

interface EmailSenderOptions {
  transport: EmailTransport | null;
  from: string;
  productName: string;
  entitySummary?: EntitySummaryRenderer;
  clock?: Clock;
}

export class EmailSender implements ChannelSender {
  readonly channel = "email" as const;

  private readonly clock: Clock;

  constructor(private readonly options: EmailSenderOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async send({ record, user }: SendContext): Promise<SenderResult> {
    const { transport } = this.options;
    if (!transport) {
      throw new ChannelUnavailableError("Email transport not configured", { channel: this.channel });
    }
    if (!user.email) {
      throw new ChannelUnavailableError("No email address for user", { channel: this.channel, userId: user.id });
    }

    const sentAt = this.clock();
    const html = renderEmailHtml({
      record,
      language: user.language,
      productName: this.options.productName,
      entitySummary: await this.renderSummary(record.relatedEntityId),
      sentAt,
    });

    const { messageId } = await transport.send({
      subject: record.title,
      to: [user.email],
      html,
      from: this.options.from,
    });

    // Accepted by the transport counts as delivered; there is no confirmation loop.
    return {
      success: true,
      status: "delivered",
      details: {
        recipient: user.email,
        messageId,
        sentAt: sentAt.toISOString(),
      },
    };
  }

  private async renderSummary(entityId: string | null): Promise<string | null> {
    const renderer = this.options.entitySummary;
    if (!entityId || !renderer) {
      return null;
    }

    try {
      return await renderer.renderEntitySummary(entityId);
    } catch (error) {
      logger.warn("Failed to render related entity summary", { entityId, error });
      return null;
    }
  }
}
