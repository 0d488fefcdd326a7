import { errorMessage, NotFoundError, Result } from '@pnr-quality/domain-kernel';
import {
  assembleRecords,
  buildRecordFilter,
  type CorrectMealCodesCommand,
  correctMealCodesCommand,
  type DetailedRecordRow,
  explainScore,
  type ImportResult,
  type ImportRowsCommand,
  importRowsCommand,
  listDeliverySystems,
  type ListDetailedRecordsQuery,
  listDetailedRecordsQuery,
  type ListDimensionsQuery,
  listDimensionsQuery,
  listOffices,
  planImport,
  type PnrRepository,
  pnrFromUpsertRow,
  type QualityScoreBreakdown,
  type QualitySummary,
  RecordAggregator,
  type RecordFilterInput,
  type ScoreRecordQuery,
  scoreRecord,
  scoreRecordQuery,
  scoreRecordsBulk,
  selectDetailedRecords,
  type SummarizeQualityQuery,
  summarizeQualityQuery,
  type UpsertRowCommand,
  upsertRowCommand,
} from '@pnr-quality/quality-domain';
import type { Logger } from 'pino';
import { ZodError } from 'zod';

export interface QualityServiceOptions {
  logger: Logger;
  /** PNRs read from storage per page while summarizing. */
  batchSize?: number;
  now?: () => Date;
}

export interface UpsertOutcome {
  controlNumber: string;
  created: boolean;
}

export interface ScoreAudit {
  checked: number;
  /** Control numbers whose per-record and set-based scores differ. */
  mismatches: string[];
}

function describeError(error: unknown, fallback: string): string {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return `Invalid input (${issues.join('; ')})`;
  }
  return errorMessage(error, fallback);
}

export class QualityService {
  private readonly logger: Logger;
  private readonly batchSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly pnrRepo: PnrRepository,
    options: QualityServiceOptions,
  ) {
    this.logger = options.logger;
    this.batchSize = options.batchSize ?? 500;
    this.now = options.now ?? (() => new Date());
  }

  async importRows(input: ImportRowsCommand): Promise<Result<ImportResult>> {
    try {
      const command = importRowsCommand(input);
      const plan = planImport(command.rows);
      const counts = await this.pnrRepo.importBatch(plan.pnrs, {
        replace: command.mode === 'replace',
      });

      const result: ImportResult = { ...counts, skippedRows: plan.skippedRows };
      this.logger.info(
        {
          mode: command.mode,
          rows: command.rows.length,
          ...result,
          duplicatePassengers: plan.duplicatePassengers,
          duplicateContacts: plan.duplicateContacts,
        },
        'Rows imported',
      );
      if (plan.skippedRows > 0) {
        this.logger.warn({ skippedRows: plan.skippedRows }, 'Rows skipped during import');
      }
      return Result.ok(result);
    } catch (error) {
      return this.failure(error, 'Failed to import rows');
    }
  }

  /** Update-or-create for a single extract row. */
  async upsertRow(input: UpsertRowCommand): Promise<Result<UpsertOutcome>> {
    try {
      const { row } = upsertRowCommand(input);
      const incoming = pnrFromUpsertRow(row);
      const existing = await this.pnrRepo.findByControlNumber(incoming.controlNumber);

      if (!existing) {
        await this.pnrRepo.save(incoming);
        this.logger.info({ controlNumber: incoming.controlNumber }, 'PNR created');
        return Result.ok({ controlNumber: incoming.controlNumber, created: true });
      }

      existing.updateAttributes({
        officeId: incoming.officeId,
        agent: incoming.agent,
        deliverySystemCompany: incoming.deliverySystemCompany,
        deliverySystemLocation: incoming.deliverySystemLocation,
        creationDate: incoming.creationDate,
      });
      for (const passenger of incoming.passengers) {
        existing.addPassenger({
          surname: passenger.surname,
          firstName: passenger.firstName,
          ffNumber: passenger.ffNumber,
          meal: passenger.meal,
          seatRowNumber: passenger.seatRowNumber,
          seatColumn: passenger.seatColumn,
        });
      }
      for (const contact of incoming.contacts) {
        existing.addContact({
          contactType: contact.contactType,
          contactDetail: contact.contactDetail,
        });
      }

      await this.pnrRepo.save(existing);
      this.logger.info({ controlNumber: existing.controlNumber }, 'PNR updated');
      return Result.ok({ controlNumber: existing.controlNumber, created: false });
    } catch (error) {
      return this.failure(error, 'Failed to upsert row');
    }
  }

  async correctMealCodes(input: CorrectMealCodesCommand): Promise<Result<{ updated: number }>> {
    try {
      const { from, to } = correctMealCodesCommand(input);
      const updated = await this.pnrRepo.updateMealCodes(from, to);
      this.logger.info({ from, to, updated }, 'Meal codes corrected');
      return Result.ok({ updated });
    } catch (error) {
      return this.failure(error, 'Failed to correct meal codes');
    }
  }

  async summarize(input: SummarizeQualityQuery = {}): Promise<Result<QualitySummary>> {
    try {
      const query = summarizeQualityQuery(input);
      const aggregator = new RecordAggregator({
        groupBy: query.groupBy,
        bucketBy: query.bucketBy,
        days: query.days,
        now: this.now(),
      });

      for await (const page of this.pnrRepo.streamPages(
        buildRecordFilter(query.filter),
        this.batchSize,
      )) {
        for (const pnr of assembleRecords(page)) aggregator.add(pnr);
      }

      return Result.ok(aggregator.summarize());
    } catch (error) {
      return this.failure(error, 'Failed to summarize quality');
    }
  }

  async scoreControlNumber(
    input: ScoreRecordQuery,
  ): Promise<Result<QualityScoreBreakdown & { controlNumber: string }>> {
    try {
      const { controlNumber } = scoreRecordQuery(input);
      const pnr = await this.pnrRepo.findByControlNumber(controlNumber);
      if (!pnr) {
        throw new NotFoundError('PNR', controlNumber);
      }
      return Result.ok({ controlNumber, ...explainScore(pnr) });
    } catch (error) {
      return this.failure(error, 'Failed to score PNR');
    }
  }

  async detailedRecords(input: ListDetailedRecordsQuery = {}): Promise<Result<DetailedRecordRow[]>> {
    try {
      const query = listDetailedRecordsQuery(input);
      const rows: DetailedRecordRow[] = [];

      for await (const page of this.pnrRepo.streamPages(
        buildRecordFilter(query.filter),
        this.batchSize,
      )) {
        rows.push(...selectDetailedRecords(assembleRecords(page), query.metric));
        if (rows.length >= query.limit) break;
      }

      return Result.ok(rows.slice(0, query.limit));
    } catch (error) {
      return this.failure(error, 'Failed to list detailed records');
    }
  }

  async listDimensions(
    input: ListDimensionsQuery = {},
  ): Promise<Result<{ deliverySystems: string[]; offices: string[] }>> {
    try {
      const query = listDimensionsQuery(input);
      const pairs = await this.pnrRepo.listDimensions();
      return Result.ok({
        deliverySystems: listDeliverySystems(pairs),
        offices: listOffices(pairs, query.deliverySystems),
      });
    } catch (error) {
      return this.failure(error, 'Failed to list dimensions');
    }
  }

  /** Scores every matching PNR along both scoring paths and reports disagreements. */
  async auditScores(filterInput: RecordFilterInput = {}): Promise<Result<ScoreAudit>> {
    try {
      const audit: ScoreAudit = { checked: 0, mismatches: [] };

      for await (const page of this.pnrRepo.streamPages(
        buildRecordFilter(filterInput),
        this.batchSize,
      )) {
        const bulk = scoreRecordsBulk(page);
        for (const pnr of assembleRecords(page)) {
          audit.checked++;
          if (bulk.get(pnr.id) !== scoreRecord(pnr)) audit.mismatches.push(pnr.controlNumber);
        }
      }

      if (audit.mismatches.length > 0) {
        this.logger.warn(
          { checked: audit.checked, mismatches: audit.mismatches.length },
          'Score paths disagree',
        );
      }
      return Result.ok(audit);
    } catch (error) {
      return this.failure(error, 'Failed to audit scores');
    }
  }

  private failure<T>(error: unknown, fallback: string): Result<T> {
    const message = describeError(error, fallback);
    this.logger.error({ err: error }, fallback);
    return Result.fail<T>(message);
  }
}
