import { afterEach, describe, expect, it, vi } from "vitest";

import { FcmPushClient } from "./fcmPush.client";

const message = {
  token: "device-token",
  title: "Claim approved",
  body: "Your claim has been approved.",
  data: { notificationId: "notif-1", eventType: "", relatedEntityId: "" },
};

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("FcmPushClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should send the notification with the server key", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ success: 1, failure: 0, results: [{ message_id: "m-1" }] }));
    vi.stubGlobal("fetch", fetchMock);

    const client = new FcmPushClient({ serverKey: "test-secret", endpoint: "https://fcm.test/send" });

    await expect(client.send(message)).resolves.toEqual({ success: true, messageId: "m-1" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://fcm.test/send");
    expect(init.headers.authorization).toBe("key=test-secret");
    expect(JSON.parse(init.body)).toEqual({
      to: "device-token",
      notification: { title: "Claim approved", body: "Your claim has been approved.", sound: "default" },
      data: { notificationId: "notif-1", eventType: "", relatedEntityId: "" },
    });
  });

  it("should surface the per-token error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ success: 0, failure: 1, results: [{ error: "NotRegistered" }] })));

    await expect(new FcmPushClient({ serverKey: "test-secret" }).send(message)).resolves.toEqual({
      success: false,
      error: "NotRegistered",
    });
  });

  it("should report http failures with their status", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("", { status: 401 })));

    await expect(new FcmPushClient({ serverKey: "test-secret" }).send(message)).resolves.toEqual({
      success: false,
      error: "HTTP 401",
      statusCode: 401,
    });
  });

  it("should fall back to an unknown error when no result is given", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ success: 0 })));

    await expect(new FcmPushClient({ serverKey: "test-secret" }).send(message)).resolves.toEqual({
      success: false,
      error: "Unknown error",
    });
  });
});
