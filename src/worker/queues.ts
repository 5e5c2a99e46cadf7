import { Queue, Worker, type Processor } from "bullmq";

import { env } from "../config/env.js";
import { logger } from "../infrastructure/logger.js";
import { getRedis } from "../infrastructure/redis.js";

export const queueNames = {
  sweepExpiredSessions: "sweep_expired_sessions"
} as const;

export type QueueName = (typeof queueNames)[keyof typeof queueNames];

export function createQueue(name: QueueName) {
  return new Queue(name, {
    connection: getRedis(),
    defaultJobOptions: {
      removeOnComplete: 100,
      removeOnFail: 500
    }
  });
}

export function createWorker<TData, TResult>(name: QueueName, processor: Processor<TData, TResult>) {
  const worker = new Worker<TData, TResult>(name, processor, {
    connection: getRedis()
  });

  worker.on("completed", (job) => {
    logger.debug({ jobId: job.id, queue: name }, "worker job completed");
  });

  worker.on("failed", (job, error) => {
    logger.error({ jobId: job?.id, queue: name, error }, "worker job failed");
  });

  return worker;
}

export function schedulerEnabled() {
  return env.NODE_ENV !== "test";
}
