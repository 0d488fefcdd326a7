// Logging
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

// Redis
export { getRedis, closeRedis, redisConnectionOptions } from './redis/connection.js';
export type { RedisConnectionOptions } from './redis/connection.js';

// BullMQ
export { createWorker } from './bullmq/job-processor.js';
export type { JobHandler, JobLike } from './bullmq/job-processor.js';

// Database
export { getDb, closeDb } from './database/connection.js';
export { withTransaction } from './database/transaction.js';
export type { Database } from './database/transaction.js';

// Scheduler
export { registerScheduledJobs } from './scheduler/cron.js';
export type { ScheduledJob } from './scheduler/cron.js';

// Health
export { checkHealth, startHealthServer } from './health/server.js';
export type { HealthCheck, HealthReport } from './health/server.js';
