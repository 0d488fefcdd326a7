import { ValidationError } from '@pnr-quality/domain-kernel';
import { z } from 'zod';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DISABLE_SCHEDULER: z
    .string()
    .default('false')
    .transform((value) => value.toLowerCase() === 'true'),
  IMPORT_BATCH_SIZE: z.coerce.number().int().min(1).max(10_000).default(500),
  SUMMARY_CRON: z.string().min(1).default('0 2 * * *'),
});

export type Config = z.output<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid environment', parsed.error);
  }
  return parsed.data;
}
