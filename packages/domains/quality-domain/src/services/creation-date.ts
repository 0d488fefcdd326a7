const NON_DIGITS = /\D/g;

/**
 * Parses the compact `ddmmyy` / `dmmyy` creation date found in booking
 * extracts. Returns a UTC-midnight Date, or null when the value cannot be
 * read as a calendar date.
 */
export function parseCreationDate(
  raw: string | number | null | undefined,
): Date | null {
  if (raw == null) return null;

  let digits = String(raw).replace(NON_DIGITS, '');
  if (digits.length === 5) digits = `0${digits}`;
  if (digits.length !== 6) return null;

  const day = Number(digits.slice(0, 2));
  const month = Number(digits.slice(2, 4));
  const year = 2000 + Number(digits.slice(4, 6));

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/** Compact `ddmmyy` of the UTC day, as booking extracts write it. */
export function formatCreationDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getUTCDate())}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCFullYear() % 100)}`;
}

/** `YYYY-MM-DD` in UTC. */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function fromIsoDay(day: string): Date {
  return new Date(`${day}T00:00:00.000Z`);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 86_400_000);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
}
