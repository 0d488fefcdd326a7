import { InvariantViolation } from '@pnr-quality/domain-kernel';
import { type Database, withTransaction } from '@pnr-quality/process-lib';
import {
  assembleRecords,
  buildDrizzleWhere,
  type ContactProps,
  type DimensionPair,
  fromIsoDay,
  type ImportCounts,
  type PassengerProps,
  type Pnr,
  type PnrPage,
  type PnrProps,
  type PnrRepository,
  type RecordFilter,
  toIsoDay,
} from '@pnr-quality/quality-domain';
import { contacts, passengers, pnrs } from '@pnr-quality/quality-domain/drizzle';
import { and, asc, eq, gt, inArray } from 'drizzle-orm';

// Stays well under the 65535 bind parameters a Postgres statement accepts.
const INSERT_CHUNK_SIZE = 1000;

type PnrRow = typeof pnrs.$inferSelect;
type PassengerRow = typeof passengers.$inferSelect;
type ContactRow = typeof contacts.$inferSelect;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class DrizzlePnrRepository implements PnrRepository {
  constructor(private readonly db: Database) {}

  async findByControlNumber(controlNumber: string): Promise<Pnr | null> {
    const [row] = await this.db
      .select()
      .from(pnrs)
      .where(eq(pnrs.control_number, controlNumber))
      .limit(1);

    if (!row) return null;
    const [pnr] = assembleRecords(await this.loadPage(this.db, [row]));
    return pnr ?? null;
  }

  async *streamPages(filter: RecordFilter, batchSize: number): AsyncGenerator<PnrPage> {
    const where = buildDrizzleWhere(filter);
    let after: string | null = null;

    for (;;) {
      const rows: PnrRow[] = await this.db
        .select()
        .from(pnrs)
        .where(and(where, after === null ? undefined : gt(pnrs.control_number, after)))
        .orderBy(asc(pnrs.control_number))
        .limit(batchSize);

      if (rows.length === 0) return;
      yield await this.loadPage(this.db, rows);
      if (rows.length < batchSize) return;
      after = rows[rows.length - 1].control_number;
    }
  }

  async importBatch(
    batch: readonly Pnr[],
    options: { replace: boolean },
  ): Promise<ImportCounts> {
    return withTransaction(this.db, async (tx) => {
      if (options.replace) {
        // children go with their PNR (on delete cascade)
        await tx.delete(pnrs);
      }

      const counts: ImportCounts = { pnrCount: 0, passengerCount: 0, contactCount: 0 };

      for (const group of chunk(batch, INSERT_CHUNK_SIZE)) {
        const inserted = await tx
          .insert(pnrs)
          .values(group.map((pnr) => this.toPnrRow(pnr)))
          .onConflictDoNothing({ target: pnrs.control_number })
          .returning({ id: pnrs.id });
        counts.pnrCount += inserted.length;

        // In append mode a control number may already be stored under another id.
        const stored = await tx
          .select({ id: pnrs.id, controlNumber: pnrs.control_number })
          .from(pnrs)
          .where(
            inArray(
              pnrs.control_number,
              group.map((pnr) => pnr.controlNumber),
            ),
          );
        const idByControlNumber = new Map(stored.map((row) => [row.controlNumber, row.id]));

        const children = this.childRows(group, idByControlNumber);
        counts.passengerCount += await this.insertPassengers(tx, children.passengers);
        counts.contactCount += await this.insertContacts(tx, children.contacts);
      }

      return counts;
    });
  }

  async save(pnr: Pnr): Promise<void> {
    const row = this.toPnrRow(pnr);
    await withTransaction(this.db, async (tx) => {
      const [stored] = await tx
        .insert(pnrs)
        .values(row)
        .onConflictDoUpdate({
          target: pnrs.control_number,
          set: {
            office_id: row.office_id,
            agent: row.agent,
            delivery_system_company: row.delivery_system_company,
            delivery_system_location: row.delivery_system_location,
            creation_date: row.creation_date,
          },
        })
        .returning({ id: pnrs.id });

      if (!stored) {
        throw new InvariantViolation(`PNR ${pnr.controlNumber} was not written`);
      }

      const children = this.childRows([pnr], new Map([[pnr.controlNumber, stored.id]]));
      await this.insertPassengers(tx, children.passengers);
      await this.insertContacts(tx, children.contacts);
    });
  }

  async updateMealCodes(from: string, to: string): Promise<number> {
    const updated = await this.db
      .update(passengers)
      .set({ meal: to })
      .where(eq(passengers.meal, from))
      .returning({ id: passengers.id });
    return updated.length;
  }

  async listDimensions(): Promise<DimensionPair[]> {
    const rows = await this.db
      .selectDistinct({
        deliverySystemCompany: pnrs.delivery_system_company,
        officeId: pnrs.office_id,
      })
      .from(pnrs);
    return rows;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async loadPage(db: Database, rows: PnrRow[]): Promise<PnrPage> {
    const ids = rows.map((row) => row.id);
    const [passengerRows, contactRows] = await Promise.all([
      db.select().from(passengers).where(inArray(passengers.pnr_id, ids)),
      db.select().from(contacts).where(inArray(contacts.pnr_id, ids)),
    ]);

    return {
      pnrs: rows.map((row) => this.mapPnr(row)),
      passengers: passengerRows.map((row) => this.mapPassenger(row)),
      contacts: contactRows.map((row) => this.mapContact(row)),
    };
  }

  private childRows(
    group: readonly Pnr[],
    idByControlNumber: Map<string, string>,
  ): { passengers: (typeof passengers.$inferInsert)[]; contacts: (typeof contacts.$inferInsert)[] } {
    const passengerRows: (typeof passengers.$inferInsert)[] = [];
    const contactRows: (typeof contacts.$inferInsert)[] = [];

    for (const pnr of group) {
      const pnrId = idByControlNumber.get(pnr.controlNumber);
      if (!pnrId) continue;
      for (const passenger of pnr.passengers) {
        passengerRows.push({
          pnr_id: pnrId,
          surname: passenger.surname,
          first_name: passenger.firstName,
          ff_number: passenger.ffNumber,
          meal: passenger.meal,
          seat_row_number: passenger.seatRowNumber,
          seat_column: passenger.seatColumn,
        });
      }
      for (const contact of pnr.contacts) {
        contactRows.push({
          pnr_id: pnrId,
          contact_type: contact.contactType,
          contact_detail: contact.contactDetail,
        });
      }
    }

    return { passengers: passengerRows, contacts: contactRows };
  }

  private async insertPassengers(
    db: Database,
    rows: (typeof passengers.$inferInsert)[],
  ): Promise<number> {
    let count = 0;
    for (const group of chunk(rows, INSERT_CHUNK_SIZE)) {
      const inserted = await db
        .insert(passengers)
        .values(group)
        .onConflictDoNothing()
        .returning({ id: passengers.id });
      count += inserted.length;
    }
    return count;
  }

  private async insertContacts(
    db: Database,
    rows: (typeof contacts.$inferInsert)[],
  ): Promise<number> {
    let count = 0;
    for (const group of chunk(rows, INSERT_CHUNK_SIZE)) {
      const inserted = await db
        .insert(contacts)
        .values(group)
        .onConflictDoNothing()
        .returning({ id: contacts.id });
      count += inserted.length;
    }
    return count;
  }

  private toPnrRow(pnr: Pnr): typeof pnrs.$inferInsert {
    return {
      id: pnr.id,
      control_number: pnr.controlNumber,
      office_id: pnr.officeId,
      agent: pnr.agent,
      delivery_system_company: pnr.deliverySystemCompany,
      delivery_system_location: pnr.deliverySystemLocation,
      creation_date: pnr.creationDate ? toIsoDay(pnr.creationDate) : null,
      created_at: pnr.createdAt,
    };
  }

  private mapPnr(row: PnrRow): PnrProps {
    return {
      id: row.id,
      controlNumber: row.control_number,
      officeId: row.office_id,
      agent: row.agent,
      deliverySystemCompany: row.delivery_system_company,
      deliverySystemLocation: row.delivery_system_location,
      creationDate: row.creation_date ? fromIsoDay(row.creation_date) : null,
      createdAt: row.created_at,
    };
  }

  private mapPassenger(row: PassengerRow): PassengerProps {
    return {
      id: row.id,
      pnrId: row.pnr_id,
      surname: row.surname,
      firstName: row.first_name,
      ffNumber: row.ff_number,
      meal: row.meal,
      seatRowNumber: row.seat_row_number,
      seatColumn: row.seat_column,
    };
  }

  private mapContact(row: ContactRow): ContactProps {
    return {
      id: row.id,
      pnrId: row.pnr_id,
      contactType: row.contact_type,
      contactDetail: row.contact_detail,
    };
  }
}
