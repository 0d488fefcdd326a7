import { Worker } from 'bullmq';
import { createLogger } from '../logger.js';
import { getRedis, redisConnectionOptions } from '../redis/connection.js';

const logger = createLogger('job-processor');

const IDEMPOTENCY_TTL_SECONDS = 86_400;

/** The part of a BullMQ job a handler reads. */
export interface JobLike<TData> {
  id?: string;
  name: string;
  data: TData;
}

export interface JobHandler<TData = unknown, TResult = unknown> {
  name: string;
  process(job: JobLike<TData>): Promise<TResult>;
  concurrency?: number;
}

/**
 * Runs the handler for each job once: a completed job id is remembered in
 * Redis for a day and a redelivery of it is skipped.
 */
export function createWorker<TData, TResult>(
  queueName: string,
  handler: JobHandler<TData, TResult>,
): Worker<TData, TResult | undefined> {
  const worker = new Worker<TData, TResult | undefined>(
    queueName,
    async (job) => {
      const redis = getRedis();
      const idempotencyKey = `idem:${queueName}:${job.id}`;
      const existing = await redis.get(idempotencyKey);
      if (existing) return undefined;
      const result = await handler.process(job);
      await redis.setex(idempotencyKey, IDEMPOTENCY_TTL_SECONDS, '1');
      return result;
    },
    { connection: redisConnectionOptions(), concurrency: handler.concurrency ?? 5 },
  );

  worker.on('failed', (job, err) => {
    logger.error({ queue: queueName, jobId: job?.id, err }, 'Job failed');
  });

  return worker;
}
