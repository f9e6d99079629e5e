import { afterEach, describe, expect, it, vi } from "vitest";

import { ProviderError } from "@/utils/errors";

import { fetchWithTimeout, readProviderError } from "./http";

function abortError() {
  return Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
}

describe("fetchWithTimeout", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should pass an abort signal to fetch", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const response = await fetchWithTimeout("test", "https://provider.test/send", { method: "POST" }, 1_000);

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://provider.test/send",
      expect.objectContaining({ method: "POST", signal: expect.any(AbortSignal) }),
    );
  });

  it("should convert an aborted request into a timeout error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockImplementation(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => reject(abortError()));
          }),
      ),
    );

    const request = fetchWithTimeout("test", "https://provider.test/send", {}, 10);

    await expect(request).rejects.toBeInstanceOf(ProviderError);
    await expect(request).rejects.toThrow("test request timed out after 10ms");
  });

  it("should wrap network failures", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("ECONNREFUSED")));

    await expect(fetchWithTimeout("test", "https://provider.test/send", {}, 1_000)).rejects.toThrow(
      "test request failed: ECONNREFUSED",
    );
  });
});

describe("readProviderError", () => {
  it("should read nested error messages", async () => {
    const response = new Response(JSON.stringify({ error: { message: "Invalid token" } }), { status: 401 });

    await expect(readProviderError(response)).resolves.toBe("Invalid token");
  });

  it("should read flat message fields", async () => {
    const response = new Response(JSON.stringify({ code: 21211, message: "Invalid 'To' number" }), { status: 400 });

    await expect(readProviderError(response)).resolves.toBe("Invalid 'To' number");
  });

  it("should fall back to the status and a trimmed body", async () => {
    await expect(readProviderError(new Response("", { status: 503 }))).resolves.toBe("HTTP 503");
    await expect(readProviderError(new Response("<html>bad gateway</html>", { status: 502 }))).resolves.toBe(
      "HTTP 502: <html>bad gateway</html>",
    );
  });
});
