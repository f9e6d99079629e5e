import { z } from "zod";

import { fetchWithTimeout, readProviderError } from "@/channels/providers/http";
import type { ProviderSendResult, WhatsAppProvider } from "@/channels/providers/types";

interface WhatsAppCloudConfig {
  accessToken: string;
  phoneNumberId: string;
  apiBase?: string;
  timeoutMs?: number;
}

const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).default([]),
});

export function normalizeWhatsAppNumber(value: string): string {
  return value.replace(/[+\s-]/g, "");
}

export class WhatsAppCloudClient implements WhatsAppProvider {
  private static readonly DEFAULT_API_BASE = "https://graph.facebook.com/v17.0";
  private static readonly DEFAULT_TIMEOUT_MS = 10_000;

  private readonly accessToken: string;
  private readonly phoneNumberId: string;
  private readonly apiBase: string;
  private readonly timeoutMs: number;

  constructor(config: WhatsAppCloudConfig) {
    this.accessToken = config.accessToken;
    this.phoneNumberId = config.phoneNumberId;
    this.apiBase = (config.apiBase ?? WhatsAppCloudClient.DEFAULT_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = Math.max(100, config.timeoutMs ?? WhatsAppCloudClient.DEFAULT_TIMEOUT_MS);
  }

  async sendMessage(to: string, text: string): Promise<ProviderSendResult> {
    const response = await fetchWithTimeout(
      "whatsapp",
      `${this.apiBase}/${encodeURIComponent(this.phoneNumberId)}/messages`,
      {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.accessToken}`,
          "content-type": "application/json",
        },
        body: JSON.stringify({
          messaging_product: "whatsapp",
          to: normalizeWhatsAppNumber(to),
          type: "text",
          text: { body: text },
        }),
      },
      this.timeoutMs,
    );

    if (!response.ok) {
      return { success: false, error: await readProviderError(response), statusCode: response.status };
    }

    const parsed = sendResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return { success: false, error: `Unexpected WhatsApp response: ${parsed.error.message}` };
    }

    return { success: true, messageId: parsed.data.messages[0]?.id ?? null };
  }
}
