import { RetryPolicy } from '../retry-utils';
import { sleep as defaultSleep } from '../sleep';
import type { SleepFunction } from '../sleep';
import type {
  HealthAttemptRecord,
  HealthCheckerOptions,
  HealthCheckResult,
  HealthFetchFunction,
  HealthPollOptions,
} from './types';

export const DEFAULT_HEALTH_MAX_ATTEMPTS = 5;
export const DEFAULT_HEALTH_INTERVAL_MS = 2000;
export const DEFAULT_HEALTH_REQUEST_TIMEOUT_MS = 5000;

/**
 * Global fetch with the response body discarded so the socket is released
 */
export const fetchStatus: HealthFetchFunction = async (url, init) => {
  const response = await fetch(url, init);
  await response.body?.cancel();

  return { status: response.status };
};

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Polls an HTTP health endpoint until it answers 200 or the attempts run out.
 * Requests are sequential; the interval is slept between attempts only.
 */
export class HealthChecker {
  private fetchFn: HealthFetchFunction;
  private sleepFn: SleepFunction;
  private now: () => number;
  private defaults: Required<HealthPollOptions>;

  constructor(options: HealthCheckerOptions = {}) {
    this.fetchFn = options.fetch ?? fetchStatus;
    this.sleepFn = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => performance.now());
    this.defaults = {
      maxAttempts:
        options.defaults?.maxAttempts ?? DEFAULT_HEALTH_MAX_ATTEMPTS,
      intervalMS: options.defaults?.intervalMS ?? DEFAULT_HEALTH_INTERVAL_MS,
      requestTimeoutMS:
        options.defaults?.requestTimeoutMS ??
        DEFAULT_HEALTH_REQUEST_TIMEOUT_MS,
    };
  }

  public async poll(
    url: string,
    options: HealthPollOptions = {},
  ): Promise<HealthCheckResult> {
    const requestTimeoutMS =
      options.requestTimeoutMS ?? this.defaults.requestTimeoutMS;
    const policy = new RetryPolicy({
      maxAttempts: options.maxAttempts ?? this.defaults.maxAttempts,
      delayMS: options.intervalMS ?? this.defaults.intervalMS,
    });

    const startedAt = this.now();
    const history: HealthAttemptRecord[] = [];

    policy.shouldDoFirstTry();

    for (;;) {
      const record = await this.attempt(url, history.length + 1, requestTimeoutMS);
      history.push(record);

      if (record.outcome === 'healthy') {
        policy.markAsSuccessful();
        break;
      }

      const { shouldRetry, delayMS } = policy.shouldRetry(
        record.error ?? `status ${record.statusCode}`,
      );

      if (!shouldRetry) {
        break;
      }

      await this.sleepFn(delayMS);
    }

    const last = history[history.length - 1];
    const healthy = last.outcome === 'healthy';
    const allTimedOut = history.every((r) => r.outcome === 'timeout');

    return {
      url,
      attempts: history.length,
      outcome: healthy ? 'healthy' : allTimedOut ? 'timeout' : 'unhealthy',
      latencyMS: last.latencyMS,
      elapsedMS: Math.round(this.now() - startedAt),
      lastStatusCode: last.statusCode,
      reason: healthy ? undefined : 'attempts_exhausted',
      history,
    };
  }

  private async attempt(
    url: string,
    attempt: number,
    requestTimeoutMS: number,
  ): Promise<HealthAttemptRecord> {
    const requestStartedAt = this.now();
    const latency = (): number => Math.round(this.now() - requestStartedAt);

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        signal: AbortSignal.timeout(requestTimeoutMS),
      });

      return {
        attempt,
        outcome: response.status === 200 ? 'healthy' : 'unhealthy',
        statusCode: response.status,
        latencyMS: latency(),
      };
    } catch (error) {
      const timedOut = isTimeoutError(error);

      return {
        attempt,
        outcome: timedOut ? 'timeout' : 'unhealthy',
        statusCode: null,
        latencyMS: latency(),
        error: timedOut
          ? `no response within ${requestTimeoutMS}ms`
          : error instanceof Error
            ? error.message
            : String(error),
      };
    }
  }
}
