import { describe, expect, test } from 'vitest';
import { InvalidEscalationError } from './errors';
import {
  createEscalationLadder,
  validateEscalationLadder,
} from './escalation';

describe('createEscalationLadder', () => {
  test('defaults to SIGTERM for 2000ms then SIGKILL for 1000ms', () => {
    expect(createEscalationLadder()).toEqual([
      { signal: 'SIGTERM', waitMS: 2000 },
      { signal: 'SIGKILL', waitMS: 1000 },
    ]);
  });

  test('takes the grace period and forced wait', () => {
    expect(createEscalationLadder(5000, 250)).toEqual([
      { signal: 'SIGTERM', waitMS: 5000 },
      { signal: 'SIGKILL', waitMS: 250 },
    ]);
  });
});

describe('validateEscalationLadder', () => {
  test('accepts a graceful-then-forced ladder and returns a copy', () => {
    const ladder = [
      { signal: 'SIGINT' as const, waitMS: 500 },
      { signal: 'SIGTERM' as const, waitMS: 2000 },
      { signal: 'SIGKILL' as const, waitMS: 1000 },
    ];

    const validated = validateEscalationLadder(ladder);

    expect(validated).toEqual(ladder);
    expect(validated[0]).not.toBe(ladder[0]);
  });

  test('rejects an empty ladder', () => {
    expect(() => validateEscalationLadder([])).toThrow(
      'Escalation ladder has no steps',
    );
  });

  test('rejects negative waits', () => {
    expect(() =>
      validateEscalationLadder([{ signal: 'SIGTERM', waitMS: -1 }]),
    ).toThrow(InvalidEscalationError);
  });

  test('rejects a graceful signal after SIGKILL', () => {
    expect(() =>
      validateEscalationLadder([
        { signal: 'SIGKILL', waitMS: 1000 },
        { signal: 'SIGTERM', waitMS: 1000 },
      ]),
    ).toThrow('Escalation step 1 sends SIGTERM after SIGKILL');
  });
});
