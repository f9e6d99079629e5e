import { Pool } from "pg";

import { config } from "@/config/config";
import { logger } from "@/utils/logger";

const REQUIRED_TABLES = ["notification_records", "user_channel_preferences", "queue_batches"] as const;

let pool: Pool | null = null;

export function getDatabasePool(): Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    connectionString: config.database.url,
    max: config.database.poolMax,
    statement_timeout: config.database.statementTimeoutMs,
    application_name: "notification-dispatch",
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  // Errors from idle clients surface on the pool, not on a query.
  pool.on("error", (error) => {
    logger.error("Idle PostgreSQL client error", { error });
  });

  return pool;
}

/** Checks connectivity and that the migrations have been applied. */
export async function initializeDatabase() {
  const result = await getDatabasePool().query<{ table_name: string; present: boolean }>(
    `SELECT table_name, to_regclass(table_name) IS NOT NULL AS present
     FROM unnest($1::text[]) AS table_name`,
    [[...REQUIRED_TABLES]],
  );

  const missing = result.rows.filter((row) => !row.present).map((row) => row.table_name);
  if (missing.length > 0) {
    throw new Error(`Database schema is missing tables: ${missing.join(", ")}. Run the migrations first.`);
  }

  logger.info("Connected to PostgreSQL", { poolMax: config.database.poolMax });
}

export async function closeDatabasePool() {
  if (!pool) {
    return;
  }

  const closing = pool;
  pool = null;
  await closing.end();
  logger.info("PostgreSQL pool closed");
}
