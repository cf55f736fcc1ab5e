import { describe, expect, test } from 'vitest';
import { applyRedaction, defaultRedactFunction } from './redaction';

describe('applyRedaction', () => {
  test('should return params untouched when no keys are given', () => {
    const params = { a: 1 };

    expect(applyRedaction(params)).toBe(params);
    expect(applyRedaction(params, [])).toBe(params);
  });

  test('should redact top-level and nested keys without mutating', () => {
    const params = {
      token: 'abc',
      webhook: { secret: 'test-secret-value', path: '/hooks' },
    };

    const redacted = applyRedaction(params, ['token', 'webhook.secret']);

    expect(redacted).toEqual({
      token: '***REDACTED***',
      webhook: { secret: 'te***************', path: '/hooks' },
    });
    expect(params.webhook.secret).toBe('test-secret-value');
  });

  test('should skip paths that do not exist', () => {
    expect(applyRedaction({ a: 1 }, ['b', 'a.c'])).toEqual({ a: 1 });
  });

  test('should use a custom redact function', () => {
    expect(applyRedaction({ key: 'value' }, ['key'], () => '[hidden]')).toEqual({
      key: '[hidden]',
    });
  });

  test('defaultRedactFunction masks short strings and non-strings fully', () => {
    expect(defaultRedactFunction('k', 'short')).toBe('***REDACTED***');
    expect(defaultRedactFunction('k', 12345)).toBe('***REDACTED***');
  });
});
