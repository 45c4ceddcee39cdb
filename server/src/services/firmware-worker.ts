import { UnrecoverableError, Worker } from "bullmq";
import { Redis } from "ioredis";
import { QueueConfig } from "../config/env";
import { LoggerLike } from "../utils/logger";
import { PermanentProcessingError, TransientInfraError } from "./errors";
import { FirmwareTaskMessage, firmwareTaskMessageSchema } from "./firmware-message";
import { DeadLetterReason, DeadLetterSink } from "./firmware-queue";
import { FirmwareStore } from "./firmware-store";

export type FirmwareTaskOutcome = "persisted" | "duplicate";

export type TaskAttempt = {
  attempt: number;
  maxAttempts: number;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function taskAttemptFromJob(job: { attemptsMade: number; opts: { attempts?: number } }): TaskAttempt {
  return {
    attempt: job.attemptsMade + 1,
    maxAttempts: Math.max(1, job.opts.attempts ?? 1)
  };
}

/**
 * Turns one task message into at most one firmware event row. Delivery is
 * at-least-once, so the (device, version, timestamp) triple is the dedupe key.
 */
export class FirmwareEventProcessor {
  constructor(
    private readonly deps: {
      store: FirmwareStore;
      deadLetters: DeadLetterSink;
      logger: LoggerLike;
    }
  ) {}

  async process(payload: unknown, attempt: TaskAttempt): Promise<FirmwareTaskOutcome> {
    const parsed = firmwareTaskMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const failure = new PermanentProcessingError("invalid_message", "Task message failed validation.");
      await this.deadLetter(payload, failure.reason, failure.message, attempt);
      throw failure;
    }

    const message = parsed.data;
    try {
      return await this.persist(message);
    } catch (error) {
      if (error instanceof PermanentProcessingError) {
        await this.deadLetter(message, error.reason, error.message, attempt);
        throw error;
      }

      const failure = new TransientInfraError("persistence_unavailable", errorMessage(error), error);
      if (attempt.attempt >= attempt.maxAttempts) {
        await this.deadLetter(message, "retries_exhausted", failure.message, attempt);
      } else {
        this.deps.logger.warn(
          {
            device_id: message.device_id,
            attempt: attempt.attempt,
            max_attempts: attempt.maxAttempts,
            err: failure.message
          },
          "firmware event persistence failed, will retry"
        );
      }
      throw failure;
    }
  }

  private async persist(message: FirmwareTaskMessage): Promise<FirmwareTaskOutcome> {
    const device = await this.deps.store.findDeviceById(message.device_id);
    if (!device) {
      throw new PermanentProcessingError(
        "device_missing",
        `Device ${message.device_id} no longer exists.`
      );
    }

    const result = await this.deps.store.insertFirmwareEvent({
      deviceId: message.device_id,
      version: message.version,
      timestamp: message.timestamp
    });

    if (result.status === "device_missing") {
      throw new PermanentProcessingError(
        "device_missing",
        `Device ${message.device_id} was removed before the event was stored.`
      );
    }

    if (result.status === "duplicate") {
      this.deps.logger.info(
        { device_id: message.device_id, version: message.version, timestamp: message.timestamp },
        "firmware event already stored"
      );
      return "duplicate";
    }

    this.deps.logger.info(
      { device_id: message.device_id, event_id: result.event.id, version: message.version },
      "firmware event stored"
    );
    return "persisted";
  }

  private async deadLetter(
    message: unknown,
    reason: DeadLetterReason,
    error: string,
    attempt: TaskAttempt
  ): Promise<void> {
    this.deps.logger.error({ reason, attempts: attempt.attempt, err: error }, "dead-lettering firmware task");
    await this.deps.deadLetters.deadLetter({
      message,
      reason,
      error,
      attempts: attempt.attempt
    });
  }
}

export type FirmwareJob = {
  data: unknown;
  attemptsMade: number;
  opts: { attempts?: number };
};

/**
 * BullMQ job callback. Permanent failures are already dead-lettered by the
 * processor and become UnrecoverableError so no further attempt is scheduled;
 * anything else is rethrown as is and retried with backoff.
 */
export function firmwareJobHandler(
  processor: FirmwareEventProcessor
): (job: FirmwareJob) => Promise<FirmwareTaskOutcome> {
  return async (job) => {
    try {
      return await processor.process(job.data, taskAttemptFromJob(job));
    } catch (error) {
      if (error instanceof PermanentProcessingError) {
        throw new UnrecoverableError(error.message);
      }
      throw error;
    }
  };
}

export function createFirmwareWorker(params: {
  config: Pick<QueueConfig, "queueName" | "concurrency">;
  connection: Redis;
  processor: FirmwareEventProcessor;
  logger: LoggerLike;
}): Worker<unknown, FirmwareTaskOutcome> {
  const worker = new Worker<unknown, FirmwareTaskOutcome>(
    params.config.queueName,
    firmwareJobHandler(params.processor),
    {
      connection: params.connection,
      concurrency: params.config.concurrency
    }
  );

  worker.on("failed", (job, error) => {
    params.logger.warn(
      {
        job_id: job?.id ?? null,
        attempts_made: job?.attemptsMade ?? null,
        err: error.message
      },
      "firmware task attempt failed"
    );
  });

  worker.on("error", (error) => {
    params.logger.error({ err: error.message }, "firmware worker error");
  });

  return worker;
}
