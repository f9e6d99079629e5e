import { config } from "@/config/config";
import { NotificationEngine } from "@/engine";
import { connectDatastores, disconnectDatastores } from "@/utils/clients";
import { logger } from "@/utils/logger";

const SHUTDOWN_TIMEOUT_MS = 15_000;

async function start() {
  let engine: NotificationEngine | null = null;

  try {
    await connectDatastores();

    engine = new NotificationEngine(config);
    engine.start();

    logger.info("Notification worker running", {
      pollIntervalMs: config.worker.pollIntervalMs,
      batchLimit: config.worker.batchLimit,
    });

    const running = engine;
    const shutdown = async (signal?: string) => {
      logger.info("Received shutdown signal", { signal });
      try {
        await running.stop(SHUTDOWN_TIMEOUT_MS);
        await disconnectDatastores();
        logger.info("Cleanup complete, exiting process");
        process.exit(0);
      } catch (error) {
        logger.error("Failed to gracefully shut down", { error });
        process.exit(1);
      }
    };

    process.once("SIGINT", () => {
      void shutdown("SIGINT");
    });

    process.once("SIGTERM", () => {
      void shutdown("SIGTERM");
    });
  } catch (error) {
    logger.error("Failed to start notification worker", { error });
    await engine?.stop(SHUTDOWN_TIMEOUT_MS).catch((stopError: unknown) => {
      logger.error("Failed to stop worker after startup failure", { stopError });
    });
    await disconnectDatastores().catch((disconnectError: unknown) => {
      logger.error("Failed to clean up resources after startup failure", { disconnectError });
    });
    process.exit(1);
  }
}

void start();
