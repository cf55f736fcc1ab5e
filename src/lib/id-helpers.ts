import { ulid } from 'ulid';

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/i;

/**
 * Generates a pipeline run ID. ULIDs sort by creation time, so run logs
 * named after them list in trigger order.
 *
 * @param seedTime - Optional timestamp in milliseconds to seed the ID with
 */
export function generateRunID(seedTime?: number): string {
  if (seedTime !== undefined && (!Number.isFinite(seedTime) || seedTime < 0)) {
    throw new TypeError(
      `seedTime must be a non-negative finite number (milliseconds), got: ${seedTime}`,
    );
  }

  return seedTime === undefined ? ulid() : ulid(seedTime);
}

export function isRunID(value: string): boolean {
  return ULID_PATTERN.test(value);
}
