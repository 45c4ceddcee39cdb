import { Queue } from "bullmq";
import { queueConfigFromEnv } from "../src/config/env";
import { DeadLetterEntry, FIRMWARE_JOB_NAME, buildJobOptions, createRedisConnection } from "../src/services/firmware-queue";
import { firmwareTaskMessageSchema } from "../src/services/firmware-message";
import { createLogger } from "../src/utils/logger";

const BATCH_SIZE = 100;

async function main(): Promise<void> {
  const logger = createLogger("replay-dead-letters");
  const config = queueConfigFromEnv();
  const connection = createRedisConnection(config.redisUrl, "worker");
  const deadLetters = new Queue<DeadLetterEntry>(config.deadLetterQueueName, { connection });
  const firmware = new Queue(config.queueName, { connection });
  const jobOptions = buildJobOptions(config);

  let replayed = 0;
  let skipped = 0;

  try {
    for (;;) {
      const jobs = await deadLetters.getWaiting(skipped, skipped + BATCH_SIZE - 1);
      if (jobs.length === 0) {
        break;
      }

      for (const job of jobs) {
        const message = firmwareTaskMessageSchema.safeParse(job.data.message);
        if (!message.success) {
          // Left in place for manual inspection.
          logger.warn({ job_id: job.id, reason: job.data.reason }, "dead letter is not a valid task message");
          skipped += 1;
          continue;
        }

        await firmware.add(FIRMWARE_JOB_NAME, message.data, jobOptions);
        await job.remove();
        replayed += 1;
      }
    }

    logger.info({ replayed, skipped }, "dead letter replay finished");
  } finally {
    await firmware.close();
    await deadLetters.close();
    await connection.quit();
  }
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
