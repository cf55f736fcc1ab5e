export type {
  HealthOutcome,
  HealthPollOptions,
  HealthAttemptRecord,
  HealthCheckResult,
  HealthResponse,
  HealthFetchFunction,
  HealthCheckerOptions,
} from './types';
export {
  HealthChecker,
  fetchStatus,
  DEFAULT_HEALTH_MAX_ATTEMPTS,
  DEFAULT_HEALTH_INTERVAL_MS,
  DEFAULT_HEALTH_REQUEST_TIMEOUT_MS,
} from './health-checker';
