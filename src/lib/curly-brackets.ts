export type TemplateFunction = (locals: Record<string, unknown>) => string;

const PLACEHOLDER_PATTERN = /(\\)?{{\s*([\w.]+?)\s*}}/g;

function lookup(locals: Record<string, unknown>, key: string): unknown {
  let current: unknown = locals;

  for (const part of key.split('.')) {
    if (current !== null && typeof current === 'object' && part in current) {
      const next: unknown = Reflect.get(current, part);
      current = next;
    } else {
      return undefined;
    }
  }

  return current;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  ) {
    return String(value);
  }

  return JSON.stringify(value);
}

/**
 * Compiles a `{{placeholder}}` template into a reusable function.
 * Dot paths reach into nested objects (`{{target.host}}`), a leading
 * backslash keeps the placeholder literal (`\{{buildID}}` → `{{buildID}}`),
 * and missing or null values render as `fallback`.
 */
export function compileTemplate(
  str: string,
  fallback: string = '(null)',
): TemplateFunction {
  return (locals: Record<string, unknown>): string =>
    str.replace(
      PLACEHOLDER_PATTERN,
      (_match: string, escape: string | undefined, key: string) => {
        if (escape) {
          return `{{${key}}}`;
        }

        const value = lookup(locals, key);

        if (value === undefined || value === null) {
          return fallback;
        }

        return stringify(value);
      },
    );
}

/**
 * Processes a template string, replacing placeholders with values from `locals`.
 *
 * ```typescript
 * CurlyBrackets('Deploying {{buildID}}', { buildID: 'b-42' }); // 'Deploying b-42'
 * ```
 */

// eslint-disable-next-line @typescript-eslint/naming-convention
export function CurlyBrackets(
  str: string = '',
  locals: Record<string, unknown> = {},
  fallback: string = '(null)',
): string {
  // Short-circuit if no brackets
  if (!str.includes('{{')) {
    return str;
  }

  return compileTemplate(str, fallback)(locals);
}
