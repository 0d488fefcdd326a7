import type { ReportableRecord } from '../services/record-aggregator.js';

type RecordSeed = Partial<ReportableRecord> & Pick<ReportableRecord, 'controlNumber'>;

export function makeRecord(seed: RecordSeed): ReportableRecord {
  return {
    officeId: '',
    agent: '',
    deliverySystemCompany: '',
    deliverySystemLocation: '',
    creationDate: null,
    contacts: [],
    passengers: [],
    ...seed,
  };
}

export function day(iso: string): Date {
  return new Date(`${iso}T00:00:00.000Z`);
}

/**
 * Scores: A1 = 100, A2 = 20, A3 = 0, A4 = 60.
 */
export function sampleRecords(): ReportableRecord[] {
  return [
    makeRecord({
      controlNumber: 'A1',
      officeId: 'NBO',
      agent: 'AG1',
      deliverySystemCompany: '1A',
      creationDate: day('2024-01-10'),
      contacts: [{ contactType: 'APE', contactDetail: 'john@example.com' }],
      passengers: [{ ffNumber: 'KQ1', meal: 'VGML', seatRowNumber: '12', seatColumn: 'A' }],
    }),
    makeRecord({
      controlNumber: 'A2',
      officeId: 'NBO',
      agent: 'AG2',
      deliverySystemCompany: '1G',
      creationDate: day('2024-01-09'),
      contacts: [{ contactType: 'CTCM', contactDetail: 'jane@example.com' }],
      passengers: [{ ffNumber: '', meal: 'AVML', seatRowNumber: '', seatColumn: '' }],
    }),
    makeRecord({
      controlNumber: 'A3',
      officeId: 'MBA',
      agent: 'AG1',
      deliverySystemCompany: '1A',
      creationDate: day('2024-01-01'),
    }),
    makeRecord({
      controlNumber: 'A4',
      officeId: 'MBA',
      agent: 'AG3',
      deliverySystemCompany: '1A',
      contacts: [
        { contactType: 'APM', contactDetail: '+254700000000' },
        { contactType: 'APE', contactDetail: 'bad' },
      ],
      passengers: [{ ffNumber: '', meal: '', seatRowNumber: '7', seatColumn: 'C' }],
    }),
  ];
}
