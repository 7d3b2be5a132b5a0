export type KennitalaErrorReason = 'FORMAT' | 'LENGTH' | 'DATE' | 'CHECKSUM';

export type KennitalaPolicy = {
  /** Two-digit years above the pivot belong to the 1900s, the rest to the 2000s. */
  centuryPivot: number;
  /** Modulus-11 check on the ninth digit. Off unless configured. */
  verifyChecksum: boolean;
};

export type KennitalaParts = {
  day: number;
  month: number;
  year: number;
  birthDate: string;
  suffix: string;
};

export const DEFAULT_KENNITALA_POLICY: KennitalaPolicy = {
  centuryPivot: 50,
  verifyChecksum: false,
};

const KENNITALA_PATTERN = /^\d{6}-?\d{4}$/;
const CHECKSUM_WEIGHTS = [3, 2, 7, 6, 5, 4, 3, 2];

const MESSAGES: Record<KennitalaErrorReason, string> = {
  FORMAT: 'Invalid kennitala format. Expected format: DDMMYY-XXXX or DDMMYYXXXX',
  LENGTH: 'Kennitala must be exactly 10 digits',
  DATE: 'Invalid date in kennitala',
  CHECKSUM: 'Invalid check digit in kennitala',
};

export class KennitalaValidationError extends Error {
  readonly reason: KennitalaErrorReason;

  constructor(reason: KennitalaErrorReason) {
    super(MESSAGES[reason]);
    this.name = 'KennitalaValidationError';
    this.reason = reason;
  }
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function resolveYear(twoDigitYear: number, policy: KennitalaPolicy): number {
  return twoDigitYear > policy.centuryPivot ? 1900 + twoDigitYear : 2000 + twoDigitYear;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  // Date.UTC maps years 0-99 to 1900-1999; resolved years are always >= 1900.
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function expectedCheckDigit(digits: string): number | null {
  let sum = 0;
  for (let i = 0; i < CHECKSUM_WEIGHTS.length; i += 1) {
    sum += Number(digits[i]) * CHECKSUM_WEIGHTS[i];
  }
  const remainder = sum % 11;
  if (remainder === 0) return 0;
  const check = 11 - remainder;
  return check === 10 ? null : check;
}

/**
 * Validates a kennitala and returns it as 10 digits without separator.
 *
 * The century comes from the two-digit year and `policy.centuryPivot`, not from the
 * century digit at the end of the number.
 */
export function validateKennitala(raw: string, policy: KennitalaPolicy = DEFAULT_KENNITALA_POLICY): string {
  if (!KENNITALA_PATTERN.test(raw)) {
    throw new KennitalaValidationError('FORMAT');
  }

  const digits = raw.replace('-', '');
  if (digits.length !== 10) {
    throw new KennitalaValidationError('LENGTH');
  }

  const day = Number(digits.slice(0, 2));
  const month = Number(digits.slice(2, 4));
  const year = resolveYear(Number(digits.slice(4, 6)), policy);

  if (!isCalendarDate(year, month, day)) {
    throw new KennitalaValidationError('DATE');
  }

  if (policy.verifyChecksum && expectedCheckDigit(digits) !== Number(digits[8])) {
    throw new KennitalaValidationError('CHECKSUM');
  }

  return digits;
}

export function describeKennitala(
  normalized: string,
  policy: KennitalaPolicy = DEFAULT_KENNITALA_POLICY,
): KennitalaParts {
  const day = Number(normalized.slice(0, 2));
  const month = Number(normalized.slice(2, 4));
  const year = resolveYear(Number(normalized.slice(4, 6)), policy);

  return {
    day,
    month,
    year,
    birthDate: `${year}-${pad2(month)}-${pad2(day)}`,
    suffix: normalized.slice(6),
  };
}

export function maskKennitala(value: string): string {
  const digits = value.replace('-', '');
  if (digits.length < 6) return '******';
  return `${digits.slice(0, 6)}-****`;
}
