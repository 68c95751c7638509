import { BookingError } from '../types/errors.js';

const E164 = /^\+[1-9]\d{7,14}$/;

/**
 * Normalizes a client phone number to E.164. National numbers (no `+` or
 * `00` prefix) get `defaultCountryCode`, dropping one leading trunk `0`.
 */
export function normalizePhone(raw: string, defaultCountryCode: string): string {
  const compact = raw.trim().replace(/[\s\-().]/g, '');

  let candidate: string;
  if (compact.startsWith('+')) {
    candidate = compact;
  } else if (compact.startsWith('00')) {
    candidate = `+${compact.slice(2)}`;
  } else {
    candidate = `+${defaultCountryCode}${compact.replace(/^0/, '')}`;
  }

  if (!E164.test(candidate)) {
    throw new BookingError('InvalidPhone', `Not a valid phone number: "${raw}"`);
  }
  return candidate;
}
