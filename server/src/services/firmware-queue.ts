import { JobsOptions, Queue } from "bullmq";
import { Redis } from "ioredis";
import { QueueConfig } from "../config/env";
import { nowIso } from "../utils/time";
import { TransientInfraError } from "./errors";
import { FirmwareTaskMessage } from "./firmware-message";

export const FIRMWARE_JOB_NAME = "save_firmware_event";
export const DEAD_LETTER_JOB_NAME = "dead_letter";

export type DeadLetterReason = "device_missing" | "invalid_message" | "retries_exhausted";

export type DeadLetterEntry = {
  message: unknown;
  reason: DeadLetterReason;
  error: string;
  attempts: number;
  failed_at: string;
};

/** The slice of a BullMQ Queue the producers use. */
export type JobQueueLike<T> = {
  add(name: string, data: T, opts?: JobsOptions): Promise<unknown>;
  close(): Promise<void>;
};

export interface FirmwareTaskQueue {
  enqueue(message: FirmwareTaskMessage): Promise<void>;
  close(): Promise<void>;
}

export interface DeadLetterSink {
  deadLetter(entry: Omit<DeadLetterEntry, "failed_at">): Promise<void>;
}

/**
 * Workers need maxRetriesPerRequest: null for their blocking commands.
 * Producers disable the offline queue so an unreachable broker fails the
 * request instead of buffering it.
 */
export function createRedisConnection(redisUrl: string, role: "producer" | "worker"): Redis {
  if (role === "worker") {
    return new Redis(redisUrl, { maxRetriesPerRequest: null });
  }
  return new Redis(redisUrl, { enableOfflineQueue: false, maxRetriesPerRequest: 1 });
}

export function buildJobOptions(config: Pick<QueueConfig, "maxRetries" | "backoffBaseMs">): JobsOptions {
  return {
    attempts: config.maxRetries + 1,
    backoff: {
      type: "exponential",
      delay: config.backoffBaseMs
    },
    removeOnComplete: { count: 1_000 },
    removeOnFail: { count: 5_000 }
  };
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${timeoutMs}ms.`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class BullFirmwareTaskQueue implements FirmwareTaskQueue {
  private readonly jobOptions: JobsOptions;

  constructor(
    private readonly queue: JobQueueLike<FirmwareTaskMessage>,
    private readonly config: Pick<QueueConfig, "maxRetries" | "backoffBaseMs" | "enqueueTimeoutMs">
  ) {
    this.jobOptions = buildJobOptions(config);
  }

  static connect(config: QueueConfig, connection: Redis): BullFirmwareTaskQueue {
    return new BullFirmwareTaskQueue(
      new Queue<FirmwareTaskMessage>(config.queueName, { connection }),
      config
    );
  }

  async enqueue(message: FirmwareTaskMessage): Promise<void> {
    try {
      await withTimeout(
        this.queue.add(FIRMWARE_JOB_NAME, message, this.jobOptions),
        this.config.enqueueTimeoutMs,
        "enqueue"
      );
    } catch (error) {
      throw new TransientInfraError("queue_unavailable", "Unable to enqueue firmware event.", error);
    }
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export class BullDeadLetterQueue implements DeadLetterSink {
  constructor(private readonly queue: JobQueueLike<DeadLetterEntry>) {}

  static connect(config: QueueConfig, connection: Redis): BullDeadLetterQueue {
    return new BullDeadLetterQueue(
      new Queue<DeadLetterEntry>(config.deadLetterQueueName, { connection })
    );
  }

  async deadLetter(entry: Omit<DeadLetterEntry, "failed_at">): Promise<void> {
    // Nothing consumes this queue; entries wait for inspection or replay.
    await this.queue.add(
      DEAD_LETTER_JOB_NAME,
      { ...entry, failed_at: nowIso() },
      { removeOnComplete: false, removeOnFail: false }
    );
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
