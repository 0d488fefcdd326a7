import { type Logger, pino } from 'pino';

export type { Logger };

/** One pino logger per process component; level from LOG_LEVEL unless given. */
export function createLogger(name: string, level = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({ name, level });
}
