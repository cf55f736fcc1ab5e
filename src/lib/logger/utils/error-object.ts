import { errorToString } from '../../error-to-string';

/**
 * Prepare an error object for logging with an optional prefix
 */
export function prepareErrorObjectLog(prefix: string, error: unknown): string {
  prefix = prefix.trim();

  const prefixLine = prefix.length > 0 ? `${prefix}:\n\n` : '';

  return prefixLine + errorToString(error);
}
