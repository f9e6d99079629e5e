import { z } from "zod";

import { fetchWithTimeout, readProviderError } from "@/channels/providers/http";
import type { SmsMessage, SmsProvider } from "@/channels/providers/types";
import { ProviderError } from "@/utils/errors";

interface TwilioSmsConfig {
  accountSid: string;
  authToken: string;
  apiBase?: string;
  timeoutMs?: number;
}

const messageResponseSchema = z.object({
  sid: z.string().min(1),
  status: z.string().optional(),
});

export class TwilioSmsClient implements SmsProvider {
  private static readonly DEFAULT_API_BASE = "https://api.twilio.com";
  private static readonly DEFAULT_TIMEOUT_MS = 10_000;

  private readonly accountSid: string;
  private readonly authToken: string;
  private readonly apiBase: string;
  private readonly timeoutMs: number;

  constructor(config: TwilioSmsConfig) {
    this.accountSid = config.accountSid;
    this.authToken = config.authToken;
    this.apiBase = (config.apiBase ?? TwilioSmsClient.DEFAULT_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = Math.max(100, config.timeoutMs ?? TwilioSmsClient.DEFAULT_TIMEOUT_MS);
  }

  async createMessage(message: SmsMessage): Promise<{ sid: string }> {
    const endpoint = `${this.apiBase}/2010-04-01/Accounts/${encodeURIComponent(this.accountSid)}/Messages.json`;
    const response = await fetchWithTimeout(
      "twilio",
      endpoint,
      {
        method: "POST",
        headers: {
          authorization: `Basic ${Buffer.from(`${this.accountSid}:${this.authToken}`).toString("base64")}`,
          "content-type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ Body: message.body, From: message.from, To: message.to }).toString(),
      },
      this.timeoutMs,
    );

    if (!response.ok) {
      const reason = await readProviderError(response);
      throw new ProviderError(`Twilio rejected message: ${reason}`, { provider: "twilio", statusCode: response.status });
    }

    const parsed = messageResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(`Unexpected Twilio response: ${parsed.error.message}`, { provider: "twilio" });
    }

    return { sid: parsed.data.sid };
  }
}
