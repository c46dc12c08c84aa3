/**
 * PII Redactor
 *
 * Phone numbers and email addresses are identity keys in this engine, so they
 * show up in almost every log line.
 */

import { env } from '../config/env';

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_REGEX = /(\+?\d[\d\s\-().]{7,}\d)/g;

/** Redact emails and phone numbers embedded in free text. */
export function redactPII(input: string): string {
  return input
    .replace(EMAIL_REGEX, '[EMAIL_REDACTED]')
    .replace(PHONE_REGEX, '[PHONE_REDACTED]');
}

/**
 * Mask a single identifier, keeping enough to correlate log lines:
 * `+17575550100` → `+1757***0100`, `jane.doe@example.com` → `ja***@example.com`.
 */
export function maskIdentifier(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  if (!env.observability.maskIdentifiersInLogs) return value;

  const at = value.indexOf('@');
  if (at > 0) {
    const local = value.slice(0, at);
    return `${local.slice(0, 2)}***${value.slice(at)}`;
  }
  if (value.length <= 6) return '***';
  return `${value.slice(0, 5)}***${value.slice(-4)}`;
}
