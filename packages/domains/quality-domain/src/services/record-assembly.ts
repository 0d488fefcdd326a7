import { Contact, type ContactProps } from '../entities/contact.js';
import { Passenger, type PassengerProps } from '../entities/passenger.js';
import { Pnr, type PnrProps } from '../entities/pnr.js';

/** One page of stored rows: PNRs plus every child row that belongs to them. */
export interface PnrPage {
  pnrs: PnrProps[];
  passengers: PassengerProps[];
  contacts: ContactProps[];
}

function groupByPnr<T extends { pnrId: string }>(rows: readonly T[]): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const row of rows) {
    const list = grouped.get(row.pnrId);
    if (list) list.push(row);
    else grouped.set(row.pnrId, [row]);
  }
  return grouped;
}

/** Rebuilds PNR aggregates from a page; child rows of other PNRs are ignored. */
export function assembleRecords(page: PnrPage): Pnr[] {
  const passengers = groupByPnr(page.passengers);
  const contacts = groupByPnr(page.contacts);

  return page.pnrs.map((props) =>
    Pnr.reconstitute(props, {
      passengers: (passengers.get(props.id) ?? []).map((p) => Passenger.reconstitute(p)),
      contacts: (contacts.get(props.id) ?? []).map((c) => Contact.reconstitute(c)),
    }),
  );
}
