import type { RedactFunction } from '../types';

export const REDACTED_PLACEHOLDER = '***REDACTED***';

/**
 * Default redaction: keeps the first two characters of longer strings so a
 * secret can still be told apart from another, masks everything else.
 */
export const defaultRedactFunction: RedactFunction = (
  _keyName: string,
  value: unknown,
): unknown => {
  if (typeof value === 'string' && value.length >= 12) {
    return value.slice(0, 2) + '*'.repeat(value.length - 2);
  }

  return REDACTED_PLACEHOLDER;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Apply redaction to params based on redacted keys.
 * Supports top-level keys and dot paths (e.g. 'webhook.secret').
 *
 * @returns New object with redacted values; the original is never mutated
 */
export function applyRedaction(
  params: Record<string, unknown>,
  redactedKeys?: string[],
  redactFunction?: RedactFunction,
): Record<string, unknown> {
  if (!redactedKeys || redactedKeys.length === 0) {
    return params;
  }

  const redactFn = redactFunction ?? defaultRedactFunction;
  const redactedParams = structuredClone(params);

  for (const key of redactedKeys) {
    const parts = key.split('.');
    const lastPart = parts.pop();
    let current: unknown = redactedParams;

    for (const part of parts) {
      current = isRecord(current) ? current[part] : undefined;
    }

    if (lastPart !== undefined && isRecord(current) && lastPart in current) {
      current[lastPart] = redactFn(key, current[lastPart]);
    }
  }

  return redactedParams;
}
