import { z } from 'zod';

// ---------------------------------------------------------------------------
// Contact types
// ---------------------------------------------------------------------------

export const ContactTypeSchema = z.enum([
  'AP',
  'APE',
  'APM',
  'CTCE',
  'CTCEM',
  'CTCM',
]);

export type ContactType = z.infer<typeof ContactTypeSchema>;

/** Types under which an email-shaped detail is correctly filed. */
export const EMAIL_CONTACT_TYPES: ReadonlySet<string> = new Set<string>([
  'AP',
  'APE',
  'CTCE',
] satisfies ContactType[]);

/** Types under which a phone-shaped detail is correctly filed. */
export const PHONE_CONTACT_TYPES: ReadonlySet<string> = new Set<string>([
  'AP',
  'APM',
  'CTCM',
] satisfies ContactType[]);

export type ContactChannel = 'email' | 'phone' | 'generic' | 'legacy' | 'unknown';

export function contactChannel(contactType: string): ContactChannel {
  switch (contactType) {
    case 'APE':
    case 'CTCE':
      return 'email';
    case 'APM':
    case 'CTCM':
      return 'phone';
    case 'AP':
      return 'generic';
    case 'CTCEM':
      return 'legacy';
    default:
      return 'unknown';
  }
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const CARRIER_PREFIX = /^[A-Z]+\/[A-Z]\+/;
const LOCALE_SUFFIX = /\/[A-Z]+$/;
const USAGE_MARKER = /-[A-Z]$/;
const SEPARATORS = /[\s+().,-]/g;
const DIGIT = /[0-9]/g;

const EMAIL_FORMAT = /^[A-Za-z0-9._%+-]+@(?:[A-Za-z0-9-]+\.)+[A-Za-z]{2,}$/;
const PHONE_FORMAT = /^\+?[0-9\s\-()]{7,25}$/;

const PHONE_KEYWORDS: readonly string[] = ['-m', '-s', 'tel', 'phone', 'mobile'];

const MIN_PHONE_DIGITS = 7;
const MIN_PHONE_DIGIT_RATIO = 0.7;

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export interface ContactClassification {
  isEmail: boolean;
  isPhone: boolean;
  isValidEmail: boolean;
  isValidPhone: boolean;
  isWronglyPlaced: boolean;
}

export type ContactVerdict = 'email' | 'phone' | 'misplaced' | 'invalid';

/**
 * Removes the carrier prefix (`KQ/M+`), the locale suffix (`/EN`) and the
 * trailing usage marker (`-M`), in that order.
 */
export function normalizeContactDetail(detail: string): string {
  return detail
    .trim()
    .replace(CARRIER_PREFIX, '')
    .replace(LOCALE_SUFFIX, '')
    .replace(USAGE_MARKER, '');
}

export function hasEmailShape(detail: string | null | undefined): boolean {
  if (!detail) return false;
  const lower = detail.toLowerCase();
  return (lower.includes('@') || lower.includes('//')) && lower.includes('.');
}

export function hasPhoneShape(detail: string | null | undefined): boolean {
  if (!detail) return false;
  const lower = detail.toLowerCase();
  if (PHONE_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return true;
  }

  const stripped = normalizeContactDetail(detail).replace(SEPARATORS, '');
  if (stripped.length === 0) return false;

  const digits = stripped.match(DIGIT)?.length ?? 0;
  return (
    digits >= MIN_PHONE_DIGITS &&
    digits / stripped.length >= MIN_PHONE_DIGIT_RATIO
  );
}

export function matchesEmailFormat(detail: string): boolean {
  return EMAIL_FORMAT.test(normalizeContactDetail(detail).replace('//', '@'));
}

export function matchesPhoneFormat(detail: string): boolean {
  return PHONE_FORMAT.test(normalizeContactDetail(detail).trim());
}

/**
 * Classifies one contact. Shape is read from the raw detail; format is
 * checked on the normalized detail and only counts under a type that
 * accepts that shape. Placement is judged on shape and type alone.
 */
export function classifyContact(
  contactType: string,
  contactDetail: string | null | undefined,
): ContactClassification {
  const isEmail = hasEmailShape(contactDetail);
  const isPhone = hasPhoneShape(contactDetail);
  const emailType = EMAIL_CONTACT_TYPES.has(contactType);
  const phoneType = PHONE_CONTACT_TYPES.has(contactType);
  const detail = contactDetail ?? '';

  return {
    isEmail,
    isPhone,
    isValidEmail: isEmail && emailType && matchesEmailFormat(detail),
    isValidPhone: isPhone && phoneType && matchesPhoneFormat(detail),
    isWronglyPlaced: (isEmail && !emailType) || (isPhone && !phoneType),
  };
}

export function isUsableContact(classification: ContactClassification): boolean {
  return classification.isValidEmail || classification.isValidPhone;
}

export function contactVerdict(classification: ContactClassification): ContactVerdict {
  if (classification.isValidEmail) return 'email';
  if (classification.isValidPhone) return 'phone';
  if (classification.isWronglyPlaced) return 'misplaced';
  return 'invalid';
}

export interface ContactLike {
  contactType: string;
  contactDetail: string | null;
}

/** True when at least one contact can be used for outreach. */
export function isReachable(contacts: readonly ContactLike[]): boolean {
  return contacts.some((contact) =>
    isUsableContact(classifyContact(contact.contactType, contact.contactDetail)),
  );
}
