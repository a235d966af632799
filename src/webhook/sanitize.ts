/**
 * Secret Redaction for Safe Logging
 *
 * Replaces credentials and document content with '[REDACTED]' before request
 * payloads reach the logs. Keys are matched case-insensitively with '_' and
 * '-' ignored.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - URL strings lose their query string (attachment URLs carry signatures)
 * - Depth limit of 10 stops runaway recursion
 */

/**
 * Fragments of normalized keys that mark credentials. A key containing any
 * of them is redacted, so `x-api-key`, `airtable_api_key` and
 * `google_refresh_token` are all caught.
 */
export const SECRET_KEY_FRAGMENTS: readonly string[] = [
  'authorization',
  'token',
  'apikey',
  'secret',
  'password',
  'privatekey',
  'signature',
];

/** Normalized keys that carry document content */
export const CONTENT_FIELDS: ReadonlySet<string> = new Set(['text', 'extractedtext', 'existingresult']);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';
const URL_WITH_QUERY = /^(https?:\/\/[^?#\s]+)[?#]\S*$/i;

function normalizeKey(key: string): string {
  return key.replace(/[_-]/g, '').toLowerCase();
}

/** True when the field's value is withheld from logs */
export function isSecretField(key: string): boolean {
  const normalized = normalizeKey(key);
  return CONTENT_FIELDS.has(normalized) || SECRET_KEY_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

/**
 * Recursively sanitize a value for safe logging.
 *
 * @returns A new value with secret fields redacted
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return obj.replace(URL_WITH_QUERY, `$1?${REDACTED}`);
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = isSecretField(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }

  return result;
}
