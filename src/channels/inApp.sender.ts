import { systemClock, type ChannelSender, type Clock } from "@/channels/channelSender";
import type { SenderResult } from "@/types/notification";

export class InAppSender implements ChannelSender {
  readonly channel = "in_app" as const;

  constructor(private readonly clock: Clock = systemClock) {}

  async send(): Promise<SenderResult> {
    return {
      success: true,
      status: "delivered",
      details: {
        type: "in_app",
        sentAt: this.clock().toISOString(),
      },
    };
  }
}
