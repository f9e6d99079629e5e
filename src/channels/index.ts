import type { ChannelSenderRegistry, Clock } from "@/channels/channelSender";
import { EmailSender } from "@/channels/email.sender";
import { InAppSender } from "@/channels/inApp.sender";
import type { ChannelProviders } from "@/channels/providers/types";
import { PushSender } from "@/channels/push.sender";
import { SmsSender } from "@/channels/sms.sender";
import { WhatsAppSender } from "@/channels/whatsapp.sender";
import type { EntitySummaryRenderer } from "@/types/user";

export interface ChannelSenderOptions {
  providers: ChannelProviders;
  emailFrom: string;
  productName: string;
  smsFromNumber: string | null;
  entitySummary?: EntitySummaryRenderer;
  clock?: Clock;
}

export function createChannelSenders(options: ChannelSenderOptions): ChannelSenderRegistry {
  const { providers, clock } = options;

  return {
    email: new EmailSender({
      transport: providers.email,
      from: options.emailFrom,
      productName: options.productName,
      entitySummary: options.entitySummary,
      clock,
    }),
    sms: new SmsSender({ provider: providers.sms, fromNumber: options.smsFromNumber, clock }),
    push: new PushSender({ provider: providers.push, clock }),
    whatsapp: new WhatsAppSender({ provider: providers.whatsapp, clock }),
    in_app: new InAppSender(clock),
  };
}
