import type { Pnr } from '../entities/pnr.js';
import type { PnrPage } from '../services/record-assembly.js';
import type { RecordFilter } from '../services/record-filter.js';
import type { ImportCounts } from '../services/row-importer.js';

export interface DimensionPair {
  deliverySystemCompany: string;
  officeId: string;
}

export interface PnrRepository {
  findByControlNumber(controlNumber: string): Promise<Pnr | null>;
  /** Pages of PNRs matching the filter, ordered by control number. */
  streamPages(filter: RecordFilter, batchSize: number): AsyncIterable<PnrPage>;
  /**
   * Inserts PNRs with their passengers and contacts in one transaction,
   * skipping rows that collide with a unique key. `replace` deletes every
   * stored PNR first. Returns the rows actually inserted.
   */
  importBatch(pnrs: readonly Pnr[], options: { replace: boolean }): Promise<ImportCounts>;
  /** Writes PNR attributes over an existing control number and adds new children. */
  save(pnr: Pnr): Promise<void>;
  updateMealCodes(from: string, to: string): Promise<number>;
  listDimensions(): Promise<DimensionPair[]>;
}
