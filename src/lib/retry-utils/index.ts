export {
  RetryPolicy,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_DELAY_MS,
} from './retry-policy';
export type {
  RetryPolicyOptions,
  RetryPolicyValidated,
  RetryQueryResult,
} from './types';
