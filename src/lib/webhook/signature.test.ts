import { createHmac } from 'crypto';
import { describe, expect, test } from 'vitest';
import { computeSignature, verifySignature } from './signature';

const SECRET = 'test-secret';
const BODY = Buffer.from('{"ref":"refs/heads/main"}');

describe('signature', () => {
  test('computes sha256=<hex hmac>', () => {
    const hex = createHmac('sha256', SECRET).update(BODY).digest('hex');

    expect(computeSignature(SECRET, BODY)).toBe(`sha256=${hex}`);
    expect(hex).toHaveLength(64);
  });

  test('accepts the matching signature', () => {
    expect(
      verifySignature(SECRET, BODY, computeSignature(SECRET, BODY)),
    ).toBe(true);
  });

  test('rejects a signature made with another secret', () => {
    expect(
      verifySignature(SECRET, BODY, computeSignature('other-secret', BODY)),
    ).toBe(false);
  });

  test('rejects a tampered body', () => {
    const signature = computeSignature(SECRET, BODY);

    expect(
      verifySignature(SECRET, Buffer.from('{"ref":"refs/heads/dev"}'), signature),
    ).toBe(false);
  });

  test('rejects missing and malformed headers', () => {
    expect(verifySignature(SECRET, BODY, undefined)).toBe(false);
    expect(verifySignature(SECRET, BODY, 'sha256=abc')).toBe(false);
    expect(verifySignature(SECRET, BODY, '')).toBe(false);
  });
});
