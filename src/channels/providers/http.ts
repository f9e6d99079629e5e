import { z } from "zod";

import { ProviderError } from "@/utils/errors";

const errorBodySchema = z.union([
  z.object({ error: z.object({ message: z.string() }) }).transform((body) => body.error.message),
  z.object({ message: z.string() }).transform((body) => body.message),
  z.object({ error: z.string() }).transform((body) => body.error),
]);

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export async function fetchWithTimeout(
  provider: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (isAbortError(error)) {
      throw new ProviderError(`${provider} request timed out after ${timeoutMs}ms`, { provider }, error);
    }
    throw new ProviderError(`${provider} request failed: ${error instanceof Error ? error.message : String(error)}`, { provider }, error);
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Extracts the most specific error message a provider put in a non-2xx response body. */
export async function readProviderError(response: Response): Promise<string> {
  const text = await response.text();
  if (text.trim().length === 0) {
    return `HTTP ${response.status}`;
  }

  const parsed = errorBodySchema.safeParse(parseJson(text));
  if (parsed.success) {
    return parsed.data;
  }

  return `HTTP ${response.status}: ${text.slice(0, 200)}`;
}
