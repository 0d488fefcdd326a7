import { describe, expect, it } from 'vitest';
import {
  classifyContact,
  contactChannel,
  contactVerdict,
  hasPhoneShape,
  isReachable,
  normalizeContactDetail,
} from './contact-classifier.js';

describe('normalizeContactDetail', () => {
  it('strips carrier prefix and locale suffix', () => {
    expect(normalizeContactDetail('KQ/M+254700000000/EN')).toBe('254700000000');
  });

  it('strips a trailing usage marker', () => {
    expect(normalizeContactDetail('+254700000000-M')).toBe('+254700000000');
  });

  it('leaves plain details untouched', () => {
    expect(normalizeContactDetail('john@example.com')).toBe('john@example.com');
  });
});

describe('classifyContact', () => {
  it('accepts // as an @ substitute for email-dedicated types', () => {
    expect(classifyContact('APE', 'john//example.com')).toEqual({
      isEmail: true,
      isPhone: false,
      isValidEmail: true,
      isValidPhone: false,
      isWronglyPlaced: false,
    });
  });

  it('flags an email filed under a phone-only type', () => {
    expect(classifyContact('CTCM', 'john@example.com')).toEqual({
      isEmail: true,
      isPhone: false,
      isValidEmail: false,
      isValidPhone: false,
      isWronglyPlaced: true,
    });
  });

  it('validates a decorated phone number after normalization', () => {
    expect(classifyContact('APM', 'KQ/M+254700000000/EN')).toEqual({
      isEmail: false,
      isPhone: true,
      isValidEmail: false,
      isValidPhone: true,
      isWronglyPlaced: false,
    });
  });

  it('validates a phone carrying a usage marker', () => {
    expect(classifyContact('APM', '+254700000000-M').isValidPhone).toBe(true);
  });

  it('treats AP as valid for both shapes', () => {
    expect(classifyContact('AP', 'john@example.com').isValidEmail).toBe(true);
    expect(classifyContact('AP', '+254 700 000 000').isValidPhone).toBe(true);
    expect(classifyContact('AP', 'john@example.com').isWronglyPlaced).toBe(false);
  });

  it('treats CTCEM as valid for neither shape', () => {
    const result = classifyContact('CTCEM', 'john@example.com');
    expect(result.isValidEmail).toBe(false);
    expect(result.isWronglyPlaced).toBe(true);
  });

  it('classifies empty and missing details as neither shape', () => {
    const empty = {
      isEmail: false,
      isPhone: false,
      isValidEmail: false,
      isValidPhone: false,
      isWronglyPlaced: false,
    };
    expect(classifyContact('AP', '')).toEqual(empty);
    expect(classifyContact('AP', null)).toEqual(empty);
    expect(classifyContact('APE', undefined)).toEqual(empty);
  });

  it('lets a detail be email- and phone-shaped at once', () => {
    const result = classifyContact('AP', '1234567890@a.io');
    expect(result.isEmail).toBe(true);
    expect(result.isPhone).toBe(true);
    expect(result.isValidEmail).toBe(true);
    expect(result.isValidPhone).toBe(false);
  });

  it('reads phone keywords anywhere in the detail', () => {
    const result = classifyContact('APE', 'john-s@example.com');
    expect(result.isPhone).toBe(true);
    expect(result.isValidEmail).toBe(true);
    expect(result.isWronglyPlaced).toBe(true);
  });

  it('requires at least seven digits for a bare number', () => {
    expect(hasPhoneShape('12345')).toBe(false);
    expect(hasPhoneShape('1234567')).toBe(true);
  });

  it('is deterministic for identical input', () => {
    const inputs: [string, string][] = [
      ['APE', 'john//example.com'],
      ['CTCM', 'john@example.com'],
      ['APM', 'KQ/M+254700000000/EN'],
    ];
    for (const [type, detail] of inputs) {
      expect(classifyContact(type, detail)).toEqual(classifyContact(type, detail));
    }
  });
});

describe('contactVerdict', () => {
  it('maps classifications to a single verdict', () => {
    expect(contactVerdict(classifyContact('APE', 'john@example.com'))).toBe('email');
    expect(contactVerdict(classifyContact('CTCM', '+254700000000'))).toBe('phone');
    expect(contactVerdict(classifyContact('CTCM', 'john@example.com'))).toBe('misplaced');
    expect(contactVerdict(classifyContact('APE', 'not-an-email'))).toBe('invalid');
  });
});

describe('contactChannel', () => {
  it('groups declared types by channel', () => {
    expect(contactChannel('CTCE')).toBe('email');
    expect(contactChannel('APM')).toBe('phone');
    expect(contactChannel('AP')).toBe('generic');
    expect(contactChannel('CTCEM')).toBe('legacy');
    expect(contactChannel('XYZ')).toBe('unknown');
  });
});

describe('isReachable', () => {
  it('is true when any contact is usable', () => {
    expect(
      isReachable([
        { contactType: 'APE', contactDetail: 'bad' },
        { contactType: 'APM', contactDetail: '+254700000000' },
      ]),
    ).toBe(true);
  });

  it('is false for no contacts or only unusable ones', () => {
    expect(isReachable([])).toBe(false);
    expect(isReachable([{ contactType: 'CTCM', contactDetail: 'john@example.com' }])).toBe(false);
  });
});
