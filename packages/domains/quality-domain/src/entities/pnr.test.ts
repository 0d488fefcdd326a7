import { InvariantViolation, ValidationError } from '@pnr-quality/domain-kernel';
import { describe, expect, it } from 'vitest';
import { Passenger } from './passenger.js';
import { Pnr } from './pnr.js';

describe('Pnr.create', () => {
  it('trims the control number and attributes', () => {
    const pnr = Pnr.create({ controlNumber: ' ABC123 ', officeId: ' NBO ' });
    expect(pnr.controlNumber).toBe('ABC123');
    expect(pnr.officeId).toBe('NBO');
    expect(pnr.creationDate).toBeNull();
  });

  it('rejects a whitespace-only control number', () => {
    let caught: unknown;
    try {
      Pnr.create({ controlNumber: '   ' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.details).toEqual({
      issues: [{ path: 'controlNumber', message: 'Control number is required' }],
    });
  });
});

describe('Pnr children', () => {
  it('ignores a repeated passenger identity', () => {
    const pnr = Pnr.create({ controlNumber: 'ABC123' });
    expect(pnr.addPassenger({ surname: 'DOE', firstName: 'JOHN' })).not.toBeNull();
    expect(pnr.addPassenger({ surname: 'DOE', firstName: 'JOHN', meal: 'VGML' })).toBeNull();
    expect(pnr.passengers).toHaveLength(1);
  });

  it('links children to the PNR', () => {
    const pnr = Pnr.create({ controlNumber: 'ABC123' });
    const contact = pnr.addContact({ contactType: 'apm', contactDetail: '+254700000000' });
    expect(contact?.pnrId).toBe(pnr.id);
    expect(contact?.contactType).toBe('APM');
    expect(contact?.verdict).toBe('phone');
  });

  it('derives the seat only when row and column are present', () => {
    const pnr = Pnr.create({ controlNumber: 'ABC123' });
    const a = pnr.addPassenger({ surname: 'DOE', firstName: 'JOHN', seatRowNumber: '12' });
    const b = pnr.addPassenger({
      surname: 'DOE',
      firstName: 'JANE',
      seatRowNumber: '12',
      seatColumn: 'B',
    });
    expect(a?.seat).toBe('');
    expect(b?.seat).toBe('12B');
  });
});

describe('Pnr identity', () => {
  it('equals its reconstituted copy', () => {
    const pnr = Pnr.create({ controlNumber: 'ABC123' });
    const copy = Pnr.reconstitute(pnr.toProps());
    expect(copy.equals(pnr)).toBe(true);
    expect(copy.equals(Pnr.create({ controlNumber: 'ABC123' }))).toBe(false);
  });
});

describe('Pnr.attachPassenger', () => {
  it('rejects a passenger built for another PNR', () => {
    const pnr = Pnr.create({ controlNumber: 'ABC123' });
    const other = Pnr.create({ controlNumber: 'XYZ789' });
    const passenger = Passenger.create({ pnrId: other.id, surname: 'DOE', firstName: 'JOHN' });
    expect(() => pnr.attachPassenger(passenger)).toThrow(InvariantViolation);
    expect(pnr.passengers).toHaveLength(0);
  });
});

describe('Pnr.updateAttributes', () => {
  it('overwrites only the given attributes', () => {
    const pnr = Pnr.create({ controlNumber: 'ABC123', officeId: 'NBO', agent: 'JD' });
    pnr.updateAttributes({ officeId: 'MBA ' });
    expect(pnr.officeId).toBe('MBA');
    expect(pnr.agent).toBe('JD');
  });
});
