import { Queue } from 'bullmq';
import { redisConnectionOptions } from '../redis/connection.js';

export interface ScheduledJob {
  name: string;
  pattern: string;
  data?: Record<string, unknown>;
}

/** Upserts repeatable jobs; registering the same name again replaces its schedule. */
export async function registerScheduledJobs(queueName: string, jobs: ScheduledJob[]): Promise<Queue> {
  const queue = new Queue(queueName, { connection: redisConnectionOptions() });
  for (const job of jobs) {
    await queue.upsertJobScheduler(job.name, { pattern: job.pattern }, { data: job.data ?? {} });
  }
  return queue;
}
