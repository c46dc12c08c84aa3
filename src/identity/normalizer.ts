/**
 * Identifier normalization.
 *
 * Phones become `+<digits>` (E.164-style), emails are trimmed and
 * lower-cased. Every function here is pure and total.
 */

export type IdentifierKind = 'phone' | 'email';

export interface NormalizedIdentifier {
  kind: IdentifierKind;
  value: string;
}

/**
 * `(757) 555-0100` and `17575550100` both become `+17575550100` with the
 * default country code. Input without any digit is returned trimmed and
 * lower-cased.
 */
export function normalizePhone(raw: string, countryCode = '1'): string {
  const digits = raw.replace(/\D/g, '');
  if (digits.length === 0) return raw.trim().toLowerCase();
  if (digits.length === 10) return `+${countryCode}${digits}`;
  if (digits.length === 11 && digits.startsWith(countryCode)) return `+${digits}`;
  return `+${digits}`;
}

export function normalizeEmail(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * SMS-gateway addresses carry the phone in the local part:
 * `757-555-0100@vtext.com` → `+17575550100`. Anything else → null.
 */
export function extractPhoneFromGatewayEmail(email: string, countryCode = '1'): string | null {
  const at = email.indexOf('@');
  if (at <= 0) return null;
  const local = email.slice(0, at).trim().replace(/[.\-+()]/g, '');
  if (!/^\d{10,11}$/.test(local)) return null;
  return normalizePhone(local, countryCode);
}

export function isGatewayEmail(email: string): boolean {
  return extractPhoneFromGatewayEmail(email) !== null;
}

/** Classify by content (`@` → email, otherwise phone) and normalize */
export function normalizeIdentifier(raw: string, countryCode = '1'): NormalizedIdentifier {
  if (raw.includes('@')) return { kind: 'email', value: normalizeEmail(raw) };
  return { kind: 'phone', value: normalizePhone(raw, countryCode) };
}
