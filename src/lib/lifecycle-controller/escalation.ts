import type { EscalationStep } from './types';
import { InvalidEscalationError } from './errors';

export const DEFAULT_GRACE_PERIOD_MS = 2000;
export const DEFAULT_FORCED_WAIT_MS = 1000;

/**
 * SIGTERM, wait the grace period, then SIGKILL
 */
export function createEscalationLadder(
  gracePeriodMS: number = DEFAULT_GRACE_PERIOD_MS,
  forcedWaitMS: number = DEFAULT_FORCED_WAIT_MS,
): EscalationStep[] {
  return [
    { signal: 'SIGTERM', waitMS: gracePeriodMS },
    { signal: 'SIGKILL', waitMS: forcedWaitMS },
  ];
}

/**
 * A ladder needs at least one step, non-negative waits, and no step may be
 * gentler than SIGKILL once SIGKILL has been sent.
 */
export function validateEscalationLadder(
  steps: readonly EscalationStep[],
): EscalationStep[] {
  if (steps.length === 0) {
    throw new InvalidEscalationError('Escalation ladder has no steps');
  }

  let forcedSeen = false;

  for (const [index, step] of steps.entries()) {
    if (!Number.isFinite(step.waitMS) || step.waitMS < 0) {
      throw new InvalidEscalationError(
        `Escalation step ${index} has an invalid wait of ${step.waitMS}ms`,
        { index, waitMS: step.waitMS },
      );
    }

    if (forcedSeen && step.signal !== 'SIGKILL') {
      throw new InvalidEscalationError(
        `Escalation step ${index} sends ${step.signal} after SIGKILL`,
        { index, signal: step.signal },
      );
    }

    forcedSeen = forcedSeen || step.signal === 'SIGKILL';
  }

  return steps.map((step) => ({ ...step }));
}
