import { createHmac } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { bearerToken, computeSignature, safeEqual, verifySignature } from '../auth.js';

describe('bearerToken', () => {
  it('reads the token after the Bearer scheme', () => {
    expect(bearerToken('Bearer test-secret')).toBe('test-secret');
    expect(bearerToken('bearer   test-secret ')).toBe('test-secret');
  });

  it('returns undefined for other schemes or no header', () => {
    expect(bearerToken('Basic dXNlcjpwYXNz')).toBeUndefined();
    expect(bearerToken(undefined)).toBeUndefined();
  });
});

describe('safeEqual', () => {
  it('compares strings of any length', () => {
    expect(safeEqual('test-secret', 'test-secret')).toBe(true);
    expect(safeEqual('test-secret', 'test-secret-longer')).toBe(false);
    expect(safeEqual('', 'x')).toBe(false);
  });
});

describe('verifySignature', () => {
  const body = Buffer.from('{"file_id":"file-1"}');
  const expected = createHmac('sha256', 'test-webhook-secret').update(body).digest('hex');

  it('computes a hex HMAC-SHA256', () => {
    expect(computeSignature('test-webhook-secret', body)).toBe(expected);
  });

  it('accepts the digest with or without the sha256= prefix', () => {
    expect(verifySignature('test-webhook-secret', body, `sha256=${expected}`)).toBe(true);
    expect(verifySignature('test-webhook-secret', body, expected.toUpperCase())).toBe(true);
  });

  it('rejects a missing header, another secret or a changed body', () => {
    expect(verifySignature('test-webhook-secret', body, undefined)).toBe(false);
    expect(verifySignature('other-secret', body, `sha256=${expected}`)).toBe(false);
    expect(verifySignature('test-webhook-secret', Buffer.from('{}'), `sha256=${expected}`)).toBe(false);
  });
});
