import { createClient } from "redis";

import { config } from "@/config/config";
import { logger } from "@/utils/logger";

export type ManagedRedisClient = ReturnType<typeof createClient>;

const COMMAND_TIMEOUT_MS = 5_000;

let client: ManagedRedisClient | null = null;
let connecting: Promise<ManagedRedisClient> | null = null;

function createManagedClient(): ManagedRedisClient {
  const created = createClient({
    url: config.redis.url,
    // While reconnecting, commands fail at once instead of queueing until Redis is back.
    disableOfflineQueue: true,
    socket: {
      reconnectStrategy: (retries) => Math.min(retries * 50, 2_000),
    },
  });

  created.on("ready", () => logger.info("Redis client ready"));
  created.on("error", (error) => logger.error("Redis client error", { error }));
  created.on("end", () => logger.warn("Redis client disconnected"));
  created.on("reconnecting", () => logger.warn("Redis client reconnecting"));

  return created;
}

async function connectClient(): Promise<ManagedRedisClient> {
  const created = createManagedClient();
  await created.connect();
  client = created;
  return created;
}

export async function getRedisClient(): Promise<ManagedRedisClient> {
  if (client?.isOpen) {
    return client;
  }

  if (!connecting) {
    connecting = connectClient().finally(() => {
      connecting = null;
    });
  }

  return connecting;
}

export async function initializeRedisService() {
  await getRedisClient();
}

/** Runs `executor` on the shared client; rejects when connecting and running take longer than `timeoutMs`. */
export async function withRedisClient<T>(
  executor: (redis: ManagedRedisClient) => Promise<T> | T,
  timeoutMs = COMMAND_TIMEOUT_MS,
): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(new Error(`Timed out waiting for Redis after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([getRedisClient().then(executor), deadline]);
  } finally {
    clearTimeout(timeout);
  }
}

export async function shutdownRedisService() {
  const current = client;
  client = null;

  if (!current?.isOpen) {
    return;
  }

  try {
    await current.quit();
    logger.info("Redis client closed");
  } catch (error) {
    logger.error("Failed to close Redis client", { error });
  }
}
