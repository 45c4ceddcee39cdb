import { databaseConfigFromEnv, queueConfigFromEnv } from "./config/env";
import { Database } from "./db/connection";
import { BullDeadLetterQueue, createRedisConnection } from "./services/firmware-queue";
import { PostgresFirmwareStore } from "./services/firmware-store";
import { FirmwareEventProcessor, createFirmwareWorker } from "./services/firmware-worker";
import { createLogger } from "./utils/logger";

async function start() {
  const logger = createLogger("firmware-worker");
  const config = queueConfigFromEnv();
  const db = new Database(databaseConfigFromEnv());
  const connection = createRedisConnection(config.redisUrl, "worker");
  const deadLetters = BullDeadLetterQueue.connect(config, connection);

  const processor = new FirmwareEventProcessor({
    store: new PostgresFirmwareStore(db),
    deadLetters,
    logger
  });
  const worker = createFirmwareWorker({ config, connection, processor, logger });

  let stopping = false;
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, "stopping firmware worker");
    // Worker.close waits for in-flight jobs before releasing the connection.
    await worker.close();
    await deadLetters.close();
    await connection.quit();
    await db.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(signal).catch((error) => {
        logger.error({ err: error }, "firmware worker shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  await worker.waitUntilReady();
  logger.info(
    {
      queue: config.queueName,
      dead_letter_queue: config.deadLetterQueueName,
      concurrency: config.concurrency,
      max_retries: config.maxRetries
    },
    "firmware worker started"
  );
}

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
