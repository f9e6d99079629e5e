import { z } from "zod";

import { fetchWithTimeout } from "@/channels/providers/http";
import type { ProviderSendResult, PushMessage, PushProvider } from "@/channels/providers/types";

interface FcmPushConfig {
  serverKey: string;
  endpoint?: string;
  timeoutMs?: number;
}

const sendResponseSchema = z.object({
  success: z.number().default(0),
  failure: z.number().default(0),
  results: z
    .array(
      z.object({
        message_id: z.string().optional(),
        error: z.string().optional(),
      }),
    )
    .default([]),
});

export class FcmPushClient implements PushProvider {
  private static readonly DEFAULT_ENDPOINT = "https://fcm.googleapis.com/fcm/send";
  private static readonly DEFAULT_TIMEOUT_MS = 10_000;

  private readonly serverKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(config: FcmPushConfig) {
    this.serverKey = config.serverKey;
    this.endpoint = config.endpoint ?? FcmPushClient.DEFAULT_ENDPOINT;
    this.timeoutMs = Math.max(100, config.timeoutMs ?? FcmPushClient.DEFAULT_TIMEOUT_MS);
  }

  async send(message: PushMessage): Promise<ProviderSendResult> {
    const response = await fetchWithTimeout(
      "fcm",
      this.endpoint,
      {
        method: "POST",
        headers: {
          authorization: `key=${this.serverKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify({
          to: message.token,
          notification: {
            title: message.title,
            body: message.body,
            sound: "default",
          },
          data: message.data,
        }),
      },
      this.timeoutMs,
    );

    if (!response.ok) {
      return { success: false, error: `HTTP ${response.status}`, statusCode: response.status };
    }

    const parsed = sendResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return { success: false, error: `Unexpected FCM response: ${parsed.error.message}` };
    }

    const [first] = parsed.data.results;
    if (parsed.data.success === 1) {
      return { success: true, messageId: first?.message_id ?? null };
    }

    return { success: false, error: first?.error ?? "Unknown error" };
  }
}
