import { closeDb, createLogger, getDb } from '@pnr-quality/process-lib';
import { z } from 'zod';
import { QualityService } from './application/quality-service.js';
import { generateSampleRows } from './application/sample-data.js';
import { loadConfig } from './config.js';
import { DrizzlePnrRepository } from './infrastructure/repositories/drizzle-pnr-repository.js';

const logger = createLogger('seed');

// Usage: npm run seed -- [bookings]
async function seed() {
  const config = loadConfig();
  const bookings = z.coerce.number().int().positive().default(100).parse(process.argv[2]);

  const service = new QualityService(new DrizzlePnrRepository(getDb(config.DATABASE_URL)), {
    logger,
  });
  try {
    const result = await service.importRows({ mode: 'append', rows: generateSampleRows({ bookings }) });
    if (result.isFailure) throw new Error(result.getError());
    logger.info(result.getValue(), 'Sample bookings seeded');
  } finally {
    await closeDb();
  }
}

seed().catch((err: unknown) => {
  logger.error({ err }, 'Seed failed');
  process.exitCode = 1;
});
