import { z } from "zod";

import { withRedisClient } from "@/services/redis.service";
import type { BatchProgressSnapshot } from "@/types/batch";
import { logger } from "@/utils/logger";

const PROGRESS_KEY_PREFIX = "notifications:batch-progress";
const PROGRESS_TTL_SECONDS = 60 * 60 * 24; // 24 hours

const snapshotSchema = z.object({
  batchId: z.string(),
  status: z.enum(["processing", "completed", "failed"]),
  processed: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  successCount: z.number().int().nonnegative(),
  failureCount: z.number().int().nonnegative(),
  error: z.string().optional(),
  updatedAt: z.string(),
});

export type BatchProgressInput = Omit<BatchProgressSnapshot, "updatedAt"> & Partial<Pick<BatchProgressSnapshot, "updatedAt">>;

export interface BatchProgressStore {
  save(snapshot: BatchProgressInput): Promise<BatchProgressSnapshot>;
  read(batchId: string): Promise<BatchProgressSnapshot | null>;
}

export function buildProgressKey(batchId: string) {
  return `${PROGRESS_KEY_PREFIX}:${batchId}`;
}

export async function saveBatchProgress(snapshot: BatchProgressInput): Promise<BatchProgressSnapshot> {
  const payload: BatchProgressSnapshot = {
    ...snapshot,
    updatedAt: snapshot.updatedAt ?? new Date().toISOString(),
  };

  try {
    await withRedisClient((client) =>
      client.setEx(buildProgressKey(snapshot.batchId), PROGRESS_TTL_SECONDS, JSON.stringify(payload)),
    );
  } catch (error) {
    logger.error("Failed to persist batch progress", { batchId: snapshot.batchId, error });
  }

  return payload;
}

export async function readBatchProgress(batchId: string): Promise<BatchProgressSnapshot | null> {
  try {
    const raw = await withRedisClient((client) => client.get(buildProgressKey(batchId)));
    if (!raw) {
      return null;
    }

    const parsed = snapshotSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.warn("Discarding malformed batch progress snapshot", { batchId });
      return null;
    }

    return parsed.data;
  } catch (error) {
    logger.error("Failed to read batch progress", { batchId, error });
    return null;
  }
}

export const redisBatchProgressStore: BatchProgressStore = {
  save: saveBatchProgress,
  read: readBatchProgress,
};
