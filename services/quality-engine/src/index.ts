import {
  closeDb,
  closeRedis,
  createLogger,
  createWorker,
  getDb,
  getRedis,
  registerScheduledJobs,
  type ScheduledJob,
  startHealthServer,
} from '@pnr-quality/process-lib';
import type { Queue } from 'bullmq';
import { sql } from 'drizzle-orm';
import { createJobHandlers, DAILY_SUMMARY_QUEUE, IMPORT_ROWS_QUEUE } from './application/job-handlers.js';
import { QualityService } from './application/quality-service.js';
import { loadConfig } from './config.js';
import { DrizzlePnrRepository } from './infrastructure/repositories/drizzle-pnr-repository.js';

const logger = createLogger('quality-engine');

async function main() {
  const config = loadConfig();
  logger.level = config.LOG_LEVEL;

  const db = getDb(config.DATABASE_URL);
  const redis = getRedis(config.REDIS_URL);

  const server = startHealthServer(config.PORT, 'quality-engine', {
    database: () => db.execute(sql`select 1`),
    redis: () => redis.ping(),
  });

  const service = new QualityService(new DrizzlePnrRepository(db), {
    logger,
    batchSize: config.IMPORT_BATCH_SIZE,
  });
  const handlers = createJobHandlers(service, logger);

  const workers = [
    createWorker(IMPORT_ROWS_QUEUE, handlers.importRows),
    createWorker(DAILY_SUMMARY_QUEUE, handlers.dailySummary),
  ];

  const schedules: Queue[] = [];
  if (config.DISABLE_SCHEDULER) {
    logger.warn('DISABLE_SCHEDULER=true, daily summary not scheduled');
  } else {
    const dailySummarySchedule: ScheduledJob[] = [
      {
        name: 'daily-summary',
        pattern: config.SUMMARY_CRON,
        data: { days: 1 },
      },
    ];
    schedules.push(await registerScheduledJobs(DAILY_SUMMARY_QUEUE, dailySummarySchedule));
  }

  logger.info({ port: config.PORT, queues: workers.length }, 'Quality engine started');

  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    await Promise.all(workers.map((w) => w.close()));
    await Promise.all(schedules.map((q) => q.close()));
    server.close();
    await closeDb();
    await closeRedis();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start quality engine');
  process.exit(1);
});
