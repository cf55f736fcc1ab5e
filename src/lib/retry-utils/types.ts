/**
 * Fixed-interval retry policy options. Attempts are counted in total
 * (the first try included), so `maxAttempts: 5` allows four retries.
 */
export interface RetryPolicyOptions {
  maxAttempts?: number;
  delayMS?: number;
}

export type RetryPolicyValidated = Required<RetryPolicyOptions>;

export interface RetryQueryResult {
  shouldRetry: boolean;
  delayMS: number;
}
