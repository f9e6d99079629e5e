import { closeDatabasePool, getDatabasePool, initializeDatabase } from "@/database/connection";
import { initializeRedisService, shutdownRedisService } from "@/services/redis.service";
import { logger } from "@/utils/logger";

export const pgPool = getDatabasePool();

export async function connectDatastores() {
  await initializeDatabase();
  await initializeRedisService();
}

/** Closes both stores even when one of them fails to shut down cleanly. */
export async function disconnectDatastores() {
  const results = await Promise.allSettled([closeDatabasePool(), shutdownRedisService()]);
  const failures = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));

  if (failures.length > 0) {
    logger.error("Datastore shutdown finished with errors", { errors: failures });
    throw new AggregateError(failures, "Failed to disconnect datastores");
  }
}
