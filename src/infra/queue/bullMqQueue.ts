import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  EntityJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { researchQueueName } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

/**
 * Task-level retry and escalation happen inside the job, so BullMQ itself only retries crashed jobs once.
 */
export const defaultJobOptions = {
  attempts: 2,
  removeOnComplete: 1_000,
  backoff: {
    type: "exponential",
    delay: 5_000,
  },
} as const;

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqQueue implements QueuePort {
  private readonly queue: Queue<EntityJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<EntityJobPayload>(researchQueueName, {
      connection,
      defaultJobOptions,
    });
  }

  /**
   * The idempotency key doubles as job id, so re-enqueueing an entity that is still queued is a no-op.
   */
  async enqueue(payload: EntityJobPayload): Promise<void> {
    await this.queue.add(payload.idempotencyKey, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

export const createResearchWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: EntityJobPayload) => Promise<void>,
): Worker<EntityJobPayload> => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<EntityJobPayload>(
    researchQueueName,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
