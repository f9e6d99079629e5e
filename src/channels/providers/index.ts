import { FcmPushClient } from "@/channels/providers/fcmPush.client";
import { createSmtpTransport } from "@/channels/providers/smtp.transport";
import { TwilioSmsClient } from "@/channels/providers/twilioSms.client";
import type { ChannelProviders } from "@/channels/providers/types";
import { WhatsAppCloudClient } from "@/channels/providers/whatsappCloud.client";
import type { AppConfig } from "@/config/config";
import { logger } from "@/utils/logger";

export function createChannelProviders(cfg: AppConfig): ChannelProviders {
  const timeoutMs = cfg.providers.timeoutMs;

  const providers: ChannelProviders = {
    email: cfg.email.smtp ? createSmtpTransport(cfg.email.smtp) : null,
    sms: cfg.sms.twilio ? new TwilioSmsClient({ ...cfg.sms.twilio, timeoutMs }) : null,
    push: cfg.push.firebaseServerKey ? new FcmPushClient({ serverKey: cfg.push.firebaseServerKey, timeoutMs }) : null,
    whatsapp: cfg.whatsapp.cloudApi ? new WhatsAppCloudClient({ ...cfg.whatsapp.cloudApi, timeoutMs }) : null,
  };

  logger.info("Channel providers configured", {
    email: providers.email !== null,
    sms: providers.sms !== null,
    push: providers.push !== null,
    whatsapp: providers.whatsapp !== null,
  });

  return providers;
}
