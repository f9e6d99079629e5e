export interface EmailMessage {
  subject: string;
  to: string[];
  html: string;
  from: string;
}

export interface EmailTransport {
  send(message: EmailMessage): Promise<{ messageId: string | null }>;
}

export interface SmsMessage {
  body: string;
  from: string;
  to: string;
}

/** Resolves with the provider message sid; rejects with a ProviderError when the provider refuses the message. */
export interface SmsProvider {
  createMessage(message: SmsMessage): Promise<{ sid: string }>;
}

export interface PushMessage {
  token: string;
  title: string;
  body: string;
  data: Record<string, string>;
}

export type ProviderSendResult =
  | { success: true; messageId: string | null }
  | { success: false; error: string; statusCode?: number };

export interface PushProvider {
  send(message: PushMessage): Promise<ProviderSendResult>;
}

export interface WhatsAppProvider {
  sendMessage(to: string, text: string): Promise<ProviderSendResult>;
}

export interface ChannelProviders {
  email: EmailTransport | null;
  sms: SmsProvider | null;
  push: PushProvider | null;
  whatsapp: WhatsAppProvider | null;
}
