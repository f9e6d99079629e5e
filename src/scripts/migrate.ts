import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { closeDatabasePool, getDatabasePool } from "@/database/connection";
import { logger } from "@/utils/logger";

const migrationsDir = fileURLToPath(new URL("../database/migrations/", import.meta.url));

async function migrate() {
  const client = await getDatabasePool().connect();

  try {
    const files = (await readdir(migrationsDir)).filter((file) => file.endsWith(".sql")).sort();

    await client.query("BEGIN");
    for (const file of files) {
      const sql = await readFile(`${migrationsDir}${file}`, "utf8");
      await client.query(sql);
      logger.info("Applied migration", { file });
    }
    await client.query("COMMIT");

    logger.info("Migrations complete", { count: files.length });
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

void migrate()
  .catch((error: unknown) => {
    logger.error("Migration failed", { error });
    process.exitCode = 1;
  })
  .finally(() => closeDatabasePool());
