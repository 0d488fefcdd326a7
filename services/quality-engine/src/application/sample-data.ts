import { addDays, formatCreationDate, type ImportRow } from '@pnr-quality/quality-domain';

const OFFICES = ['NBO', 'MBA', 'KIS', 'EBB', 'DAR'];
const DELIVERY_SYSTEMS = ['1A', '1S', '1G'];
const AGENTS = ['AOK', 'BMW', 'CNJ', 'DKM'];
const SURNAMES = ['OTIENO', 'WANJIRU', 'MUTUA', 'ACHIENG', 'KAMAU', 'NJERI'];
const FIRST_NAMES = ['JAMES', 'MARY', 'PETER', 'GRACE', 'DAVID', 'FAITH'];
const MEALS = ['VGML', 'AVML', 'KSML', 'DBML'];
const SEAT_COLUMNS = ['A', 'B', 'C', 'D', 'E', 'F'];

type ContactMaker = (surname: string, firstName: string) => [type: string, detail: string];

// Valid emails, valid phones, misplaced and malformed details.
const CONTACTS: ContactMaker[] = [
  (s, f) => ['APE', `${f}.${s}@example.com`.toLowerCase()],
  () => ['APM', '+254700000000'],
  (s) => ['CTCE', `${s}@example.org`.toLowerCase()],
  () => ['CTCM', '0722000000'],
  (s, f) => ['APM', `${f}@example.com`.toLowerCase()],
  () => ['APE', '0733000000'],
  () => ['AP', 'NBO 0722000000-H'],
  () => ['APE', 'not an email'],
];

export interface SampleOptions {
  bookings: number;
  /** Creation dates fall within the 30 days ending here. */
  now?: Date;
  random?: () => number;
}

/** Synthetic extract rows, one per passenger, for demo and load runs. */
export function generateSampleRows({
  bookings,
  now = new Date(),
  random = Math.random,
}: SampleOptions): ImportRow[] {
  const pick = <T>(list: readonly T[]): T => list[Math.floor(random() * list.length)];
  const rows: ImportRow[] = [];

  for (let i = 1; i <= bookings; i++) {
    const controlNumber = `SMP${String(i).padStart(5, '0')}`;
    const office = pick(OFFICES);
    const booking = {
      ControlNumber: controlNumber,
      OfficeID: office,
      Agent: pick(AGENTS),
      DeliverySystemCompany: pick(DELIVERY_SYSTEMS),
      DeliverySystemLocation: office,
      creationDate: formatCreationDate(addDays(now, -Math.floor(random() * 30))),
    };

    const passengers = 1 + Math.floor(random() * 3);
    for (let p = 0; p < passengers; p++) {
      const surname = pick(SURNAMES);
      const firstName = pick(FIRST_NAMES);
      const [contactType, contactDetail] = pick(CONTACTS)(surname, firstName);
      const seated = random() < 0.7;
      rows.push({
        ...booking,
        Surname: surname,
        FirstName: firstName,
        ContactType: contactType,
        ContactDetail: contactDetail,
        FFNumber: random() < 0.6 ? `KQ${String(100000 + i)}` : '',
        Meal: random() < 0.5 ? pick(MEALS) : '',
        SeatRowNumber: seated ? String(1 + Math.floor(random() * 40)) : '',
        SeatColumn: seated ? pick(SEAT_COLUMNS) : '',
      });
    }
  }
  return rows;
}
