import { databaseConfigFromEnv, env, queueConfigFromEnv } from "./config/env";
import { Database } from "./db/connection";
import { runMigrations } from "./db/migrate";
import { buildApp } from "./app";
import { BullFirmwareTaskQueue, createRedisConnection } from "./services/firmware-queue";
import { PostgresFirmwareStore } from "./services/firmware-store";

async function start() {
  const db = new Database(databaseConfigFromEnv());
  const queueConfig = queueConfigFromEnv();
  const redis = createRedisConnection(queueConfig.redisUrl, "producer");
  const queue = BullFirmwareTaskQueue.connect(queueConfig, redis);

  const shutdown = async () => {
    await queue.close();
    await redis.quit();
    await db.close();
  };

  try {
    await runMigrations(db);
  } catch (error) {
    await shutdown();
    throw error;
  }

  const app = buildApp({
    store: new PostgresFirmwareStore(db),
    queue
  });
  app.addHook("onClose", shutdown);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "shutting down");
      app.close().catch((error) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  await app.listen({
    host: "0.0.0.0",
    port: env.PORT
  });
}

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
