import { isPlainObject } from './type-guards';

const INDENT = '    ';

function safeStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    default:
      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
  }
}

function describeError(error: unknown, depth: number): string[] {
  const pad = INDENT.repeat(depth);

  if (error === null || typeof error !== 'object') {
    return [`${pad}${safeStringify(error)}`];
  }

  const err = (key: string): unknown => Reflect.get(error, key);
  const lines: string[] = [];

  const addRow = (label: string, value: unknown): void => {
    if (value !== undefined && value !== null && value !== '') {
      lines.push(`${pad}${label}: ${safeStringify(value)}`);
    }
  };

  addRow('Message', err('message'));
  addRow('Name', err('name'));
  addRow('Code', err('code'));
  // conventional fields used by the error classes in this package
  addRow('Prefix', err('errPrefix'));
  addRow('errType', err('errType'));
  addRow('errCode', err('errCode'));

  const additionalInfo = err('additionalInfo');

  if (isPlainObject(additionalInfo)) {
    for (const [key, value] of Object.entries(additionalInfo)) {
      if (value instanceof Error) {
        lines.push(`${pad}AdditionalInfo.${key}:`);
        lines.push(...describeError(value, depth + 1));
      } else {
        lines.push(`${pad}AdditionalInfo.${key}: ${safeStringify(value)}`);
      }
    }
  }

  const cause = err('cause');

  if (cause instanceof Error && depth < 3) {
    lines.push(`${pad}Cause:`);
    lines.push(...describeError(cause, depth + 1));
  }

  const stack = err('stack');

  if (depth === 0 && typeof stack === 'string') {
    lines.push(`${pad}Stack:`);
    lines.push(stack);
  }

  return lines;
}

/**
 * Renders an error (or any thrown value) as `Label: value` lines, including
 * the package's `errPrefix`/`errType`/`errCode`/`additionalInfo` fields and
 * nested causes.
 */
export function errorToString(
  error: unknown,
  options: { includeStack?: boolean } = {},
): string {
  const lines = describeError(error, 0);

  if (options.includeStack === false) {
    const stackIndex = lines.indexOf('Stack:');

    if (stackIndex !== -1) {
      lines.length = stackIndex;
    }
  }

  return lines.join('\n');
}
