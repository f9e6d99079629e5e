import type { QueryResult, QueryResultRow } from "pg";

import { detailsSchema } from "@/types/notification";
import { pgPool } from "@/utils/clients";
import { PersistenceError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export async function runQuery<R extends QueryResultRow>(
  operation: string,
  text: string,
  values: unknown[] = [],
): Promise<QueryResult<R>> {
  try {
    return await pgPool.query<R>(text, values);
  } catch (error) {
    logger.error("Database query failed", { operation, error });
    throw new PersistenceError(`Failed to ${operation}`, error);
  }
}

export function affectedRows(result: { rowCount: number | null }): number {
  return result.rowCount ?? 0;
}

/** jsonb arrives parsed from pg, but rows copied through text columns may still hold strings. */
export function parseJsonObject(value: unknown): Record<string, unknown> | null {
  if (value === null || value === undefined) {
    return null;
  }

  let candidate: unknown = value;
  if (typeof value === "string") {
    try {
      candidate = JSON.parse(value);
    } catch {
      return null;
    }
  }

  const parsed = detailsSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}
