import { describe, it, expect } from 'vitest';
import { CONTENT_FIELDS, SECRET_KEY_FRAGMENTS, isSecretField, sanitizeForLog } from '../sanitize.js';

describe('sanitizeForLog', () => {
  describe('primitive values', () => {
    it('returns numbers, booleans, null and undefined unchanged', () => {
      expect(sanitizeForLog(42)).toBe(42);
      expect(sanitizeForLog(false)).toBe(false);
      expect(sanitizeForLog(null)).toBeNull();
      expect(sanitizeForLog(undefined)).toBeUndefined();
    });

    it('returns plain strings unchanged', () => {
      expect(sanitizeForLog('recABC123')).toBe('recABC123');
    });

    it('drops query strings from URLs', () => {
      expect(sanitizeForLog('https://files.example.com/a.pdf?sig=abc&exp=1')).toBe(
        'https://files.example.com/a.pdf?[REDACTED]',
      );
      expect(sanitizeForLog('https://files.example.com/a.pdf')).toBe('https://files.example.com/a.pdf');
    });
  });

  describe('secret field redaction', () => {
    it('redacts credentials regardless of key style', () => {
      expect(
        sanitizeForLog({ api_key: 'test-secret', apiKey: 'test-secret', 'X-Api-Key': 'test-secret' }),
      ).toEqual({ api_key: '[REDACTED]', apiKey: '[REDACTED]', 'X-Api-Key': '[REDACTED]' });
    });

    it('redacts document content fields', () => {
      expect(sanitizeForLog({ Text: 'contract body', existing_result: { Text: 'x' } })).toEqual({
        Text: '[REDACTED]',
        existing_result: '[REDACTED]',
      });
    });

    it('redacts keys that merely contain a credential fragment', () => {
      expect(
        sanitizeForLog({
          airtable_api_key: 'test-secret',
          google_refresh_token: 'test-secret',
          WEBHOOK_SECRET: 'test-secret',
          'X-Hub-Signature-256': 'sha256=abc',
        }),
      ).toEqual({
        airtable_api_key: '[REDACTED]',
        google_refresh_token: '[REDACTED]',
        WEBHOOK_SECRET: '[REDACTED]',
        'X-Hub-Signature-256': '[REDACTED]',
      });
    });

    it('redacts every fragment and content field on its own', () => {
      for (const key of [...SECRET_KEY_FRAGMENTS, ...CONTENT_FIELDS]) {
        expect(sanitizeForLog({ [key]: 'value' })).toEqual({ [key]: '[REDACTED]' });
      }
    });

    it('isSecretField ignores case, underscores and dashes', () => {
      expect(isSecretField('Private_Key')).toBe(true);
      expect(isSecretField('refresh-token')).toBe(true);
      expect(isSecretField('file_id')).toBe(false);
      expect(isSecretField('new_name')).toBe(false);
      expect(isSecretField('record_id')).toBe(false);
    });
  });

  describe('non-secret fields preserved', () => {
    it('keeps identifiers and names', () => {
      const input = { record_id: 'rec1', file_id: 'file-1', new_name: 'Invoice.pdf' };
      expect(sanitizeForLog(input)).toEqual(input);
    });
  });

  describe('nested objects and arrays', () => {
    it('redacts inside nested objects', () => {
      expect(sanitizeForLog({ outer: { inner: { password: 'test-secret', safe: 'ok' } } })).toEqual({
        outer: { inner: { password: '[REDACTED]', safe: 'ok' } },
      });
    });

    it('summarizes arrays without iterating', () => {
      expect(sanitizeForLog({ attachment_urls: ['a', 'b', 'c'] })).toEqual({ attachment_urls: '[Array(3)]' });
    });

    it('stops at the depth limit', () => {
      let nested: Record<string, unknown> = { leaf: 'x' };
      for (let i = 0; i < 12; i++) {
        nested = { child: nested };
      }

      let cursor = sanitizeForLog(nested);
      for (let i = 0; i < 10; i++) {
        if (typeof cursor !== 'object' || cursor === null || !('child' in cursor)) {
          throw new Error(`expected an object at depth ${i}`);
        }
        cursor = cursor.child;
      }
      expect(cursor).toBe('[Object]');
    });
  });
});
