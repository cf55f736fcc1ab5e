import type { SleepFunction } from '../sleep';

export type HealthOutcome = 'healthy' | 'unhealthy' | 'timeout';

export interface HealthPollOptions {
  /** Total requests allowed, the first one included */
  maxAttempts?: number;
  intervalMS?: number;
  requestTimeoutMS?: number;
}

export interface HealthAttemptRecord {
  attempt: number;
  outcome: HealthOutcome;
  statusCode: number | null;
  latencyMS: number;
  error?: string;
}

export interface HealthCheckResult {
  url: string;
  attempts: number;
  outcome: HealthOutcome;

  /** Latency of the last request */
  latencyMS: number;

  /** Wall time of the whole poll, sleeps included */
  elapsedMS: number;
  lastStatusCode: number | null;
  reason?: 'attempts_exhausted';
  history: HealthAttemptRecord[];
}

export interface HealthResponse {
  status: number;
}

/**
 * The slice of `fetch` the checker needs. Must reject with an error named
 * `TimeoutError` when `signal` aborts because of a timeout.
 */
export type HealthFetchFunction = (
  url: string,
  init: { method: 'GET'; signal: AbortSignal },
) => Promise<HealthResponse>;

export interface HealthCheckerOptions {
  fetch?: HealthFetchFunction;
  sleep?: SleepFunction;
  now?: () => number;
  defaults?: HealthPollOptions;
}
