/**
 * PII Redactor
 *
 * Replaces email- and phone-shaped substrings with fixed placeholders.
 * Each pattern runs as one left-to-right, non-overlapping pass; emails go first.
 */

// ───── Patterns ─────────────────────────────────────────────────

export const EMAIL_PATTERN = /[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+/g;
export const PHONE_PATTERN = /\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;

export const EMAIL_PLACEHOLDER = '[REDACTED_EMAIL]';
export const PHONE_PLACEHOLDER = '[REDACTED_PHONE]';

// ───── Public API ───────────────────────────────────────────────

/** Redact emails, then phone numbers, from a string. */
export function redactPII(input: string): string {
  return input
    .replace(EMAIL_PATTERN, EMAIL_PLACEHOLDER)
    .replace(PHONE_PATTERN, PHONE_PLACEHOLDER);
}

/**
 * Redact PII from all string values in an object, descending into nested
 * objects and arrays.
 */
export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    result[key] = redactValue(val);
  }
  return result;
}

function redactValue(val: unknown): unknown {
  if (typeof val === 'string') return redactPII(val);
  if (Array.isArray(val)) return val.map(redactValue);
  if (isPlainRecord(val)) return redactObject(val);
  return val;
}

function isPlainRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}
