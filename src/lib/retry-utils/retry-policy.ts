import type {
  RetryPolicyOptions,
  RetryPolicyValidated,
  RetryQueryResult,
} from './types';

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_DELAY_MS = 2000;

interface CurrentState {
  wasInitialAttemptTaken: boolean;
  wasSuccessful: boolean;
  errors: unknown[];
}

function sanitize(
  value: number | undefined,
  min: number,
  defaultValue: number,
): number {
  if (value === undefined || !Number.isFinite(value)) {
    return defaultValue;
  }

  return Math.max(value, min);
}

/**
 * Bookkeeping for a bounded, fixed-interval retry loop. The policy never
 * sleeps or runs anything itself; the caller asks it whether another
 * attempt is allowed and how long to wait first.
 *
 * ```typescript
 * const policy = new RetryPolicy({ maxAttempts: 5, delayMS: 2000 });
 * policy.shouldDoFirstTry();
 *
 * while (true) {
 *   if (await tryOnce()) {
 *     policy.markAsSuccessful();
 *     break;
 *   }
 *
 *   const { shouldRetry, delayMS } = policy.shouldRetry(lastError);
 *   if (!shouldRetry) break;
 *   await sleep(delayMS);
 * }
 * ```
 */
export class RetryPolicy {
  private policy: RetryPolicyValidated;
  private currentState: CurrentState = this.getEmptyCurrentState();

  constructor(policy: RetryPolicyOptions = {}) {
    this.policy = {
      maxAttempts: Math.floor(
        sanitize(policy.maxAttempts, 1, DEFAULT_MAX_ATTEMPTS),
      ),
      delayMS: sanitize(policy.delayMS, 0, DEFAULT_DELAY_MS),
    };
  }

  public get policyInfo(): RetryPolicyValidated {
    return { ...this.policy };
  }

  public get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  /**
   * Total attempts made so far, the initial attempt included
   */
  public get attempts(): number {
    if (!this.currentState.wasInitialAttemptTaken) {
      return 0;
    }

    const failed = this.currentState.errors.length;

    if (this.currentState.wasSuccessful) {
      return failed + 1;
    }

    return Math.max(failed, 1);
  }

  /**
   * Attempts made after the initial one
   */
  public get retryCount(): number {
    return Math.max(this.attempts - 1, 0);
  }

  public get wasInitialAttemptTaken(): boolean {
    return this.currentState.wasInitialAttemptTaken;
  }

  public get wasSuccessful(): boolean {
    return this.currentState.wasSuccessful;
  }

  public get areAttemptsExhausted(): boolean {
    return this.currentState.errors.length >= this.policy.maxAttempts;
  }

  public get errors(): unknown[] {
    return [...this.currentState.errors];
  }

  public get lastError(): unknown {
    const { errors } = this.currentState;

    return errors.length === 0 ? null : errors[errors.length - 1];
  }

  public reset(): void {
    this.currentState = this.getEmptyCurrentState();
  }

  /**
   * Returns true exactly once, marking the initial attempt as taken
   */
  public shouldDoFirstTry(): boolean {
    if (this.currentState.wasInitialAttemptTaken) {
      return false;
    }

    this.currentState.wasInitialAttemptTaken = true;

    return true;
  }

  public markAsSuccessful(): void {
    this.currentState.wasSuccessful = true;
  }

  /**
   * Records the failed attempt's error and decides whether another attempt
   * is allowed. Never retries once successful or once `maxAttempts`
   * failures have been recorded.
   */
  public shouldRetry(error: unknown): RetryQueryResult {
    this.currentState.errors.push(error);

    if (this.currentState.wasSuccessful || this.areAttemptsExhausted) {
      return { shouldRetry: false, delayMS: 0 };
    }

    return { shouldRetry: true, delayMS: this.policy.delayMS };
  }

  private getEmptyCurrentState(): CurrentState {
    return {
      wasInitialAttemptTaken: false,
      wasSuccessful: false,
      errors: [],
    };
  }
}
