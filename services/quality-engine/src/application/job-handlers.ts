import type { JobHandler } from '@pnr-quality/process-lib';
import type { ImportResult, ImportRowsCommand, QualitySummary } from '@pnr-quality/quality-domain';
import type { Logger } from 'pino';
import type { QualityService } from './quality-service.js';

export const IMPORT_ROWS_QUEUE = 'quality:import-rows';
export const DAILY_SUMMARY_QUEUE = 'quality:daily-summary';

export interface DailySummaryJobData {
  /** Days covered by the time series, today included. */
  days?: number;
}

export interface QualityJobHandlers {
  importRows: JobHandler<ImportRowsCommand, ImportResult>;
  dailySummary: JobHandler<DailySummaryJobData, QualitySummary>;
}

export function createJobHandlers(
  service: Pick<QualityService, 'importRows' | 'summarize'>,
  logger: Logger,
): QualityJobHandlers {
  const importRows: JobHandler<ImportRowsCommand, ImportResult> = {
    name: IMPORT_ROWS_QUEUE,
    // Imports in replace mode must not interleave.
    concurrency: 1,
    async process(job) {
      logger.info(
        { jobId: job.id, rows: job.data.rows.length, mode: job.data.mode ?? 'replace' },
        'Processing import job',
      );

      const result = await service.importRows(job.data);
      if (result.isFailure) {
        throw new Error(result.getError());
      }
      return result.getValue();
    },
  };

  const dailySummary: JobHandler<DailySummaryJobData, QualitySummary> = {
    name: DAILY_SUMMARY_QUEUE,
    concurrency: 1,
    async process(job) {
      const days = job.data.days ?? 1;
      logger.info({ jobId: job.id, days }, 'Running daily quality summary');

      const result = await service.summarize({
        groupBy: 'delivery_system',
        bucketBy: 'day',
        days,
      });
      if (result.isFailure) {
        throw new Error(result.getError());
      }

      const summary = result.getValue();
      logger.info(
        {
          total: summary.totals.total,
          reachable: summary.percentages.reachable,
          averageScore: summary.averageScore,
          deliverySystems: summary.groups.length,
        },
        'Daily quality summary',
      );
      return summary;
    },
  };

  return { importRows, dailySummary };
}
