import { DomainError } from '@pnr-quality/domain-kernel';
import { ZodError } from 'zod';
import type { ParsedImportRow } from '../commands/import-rows.js';
import { Contact } from '../entities/contact.js';
import { Passenger } from '../entities/passenger.js';
import { Pnr } from '../entities/pnr.js';
import { parseCreationDate } from './creation-date.js';

export interface ImportPlan {
  pnrs: Pnr[];
  /** Rows with no control number, or values the schema rejects. */
  skippedRows: number;
  duplicatePassengers: number;
  duplicateContacts: number;
}

export interface ImportCounts {
  pnrCount: number;
  passengerCount: number;
  contactCount: number;
}

export interface ImportResult extends ImportCounts {
  skippedRows: number;
}

function pnrFromRow(row: ParsedImportRow): Pnr {
  return Pnr.create({
    controlNumber: row.ControlNumber,
    officeId: row.OfficeID,
    agent: row.Agent,
    deliverySystemCompany: row.DeliverySystemCompany,
    deliverySystemLocation: row.DeliverySystemLocation,
    creationDate: parseCreationDate(row.creationDate),
  });
}

interface RowEntities {
  pnr: Pnr;
  passenger: Passenger | null;
  contact: Contact | null;
}

/**
 * Builds every entity a row describes without touching any aggregate; throws
 * when any part of the row is invalid. `existing` is the PNR already folded
 * for the row's control number.
 */
function entitiesFromRow(row: ParsedImportRow, existing?: Pnr): RowEntities {
  const pnr = existing ?? pnrFromRow(row);
  const passenger =
    row.Surname !== '' || row.FirstName !== ''
      ? Passenger.create({
          pnrId: pnr.id,
          surname: row.Surname,
          firstName: row.FirstName,
          ffNumber: row.FFNumber,
          meal: row.Meal,
          seatRowNumber: row.SeatRowNumber,
          seatColumn: row.SeatColumn,
        })
      : null;
  const contact =
    row.ContactDetail !== ''
      ? Contact.create({
          pnrId: pnr.id,
          contactType: row.ContactType,
          contactDetail: row.ContactDetail,
        })
      : null;
  return { pnr, passenger, contact };
}

/**
 * Folds extract rows into PNR aggregates. The first row seen for a control
 * number supplies the PNR attributes; passengers are unique per
 * (surname, first name) and contacts per (type, detail) within a PNR, first
 * occurrence wins. A malformed row is counted and contributes nothing.
 */
export function planImport(rows: readonly ParsedImportRow[]): ImportPlan {
  const byControlNumber = new Map<string, Pnr>();
  let skippedRows = 0;
  let duplicatePassengers = 0;
  let duplicateContacts = 0;

  for (const row of rows) {
    if (row.ControlNumber === '') {
      skippedRows++;
      continue;
    }

    let entities: RowEntities;
    try {
      entities = entitiesFromRow(row, byControlNumber.get(row.ControlNumber));
    } catch (error) {
      if (error instanceof ZodError || error instanceof DomainError) {
        skippedRows++;
        continue;
      }
      throw error;
    }

    const { pnr, passenger, contact } = entities;
    byControlNumber.set(row.ControlNumber, pnr);
    if (passenger && !pnr.attachPassenger(passenger)) duplicatePassengers++;
    if (contact && !pnr.attachContact(contact)) duplicateContacts++;
  }

  return {
    pnrs: [...byControlNumber.values()],
    skippedRows,
    duplicatePassengers,
    duplicateContacts,
  };
}

/** Builds the single PNR an update-or-create row describes; throws on any invalid part. */
export function pnrFromUpsertRow(row: ParsedImportRow): Pnr {
  const { pnr, passenger, contact } = entitiesFromRow(row);
  if (passenger) pnr.attachPassenger(passenger);
  if (contact) pnr.attachContact(contact);
  return pnr;
}
