import type { HealthFetchFunction, HealthResponse } from './types';

export type ScriptedHealthReply = number | 'timeout' | 'refused';

/**
 * Scripted stand-in for fetch. Each request consumes the next reply; the
 * last reply repeats.
 */
export function createTestFetch(replies: ScriptedHealthReply[]): {
  fetch: HealthFetchFunction;
  requests: string[];
} {
  const requests: string[] = [];
  const queue = [...replies];

  const fetchFn: HealthFetchFunction = (url) => {
    requests.push(url);

    const reply = queue.length > 1 ? queue.shift() : queue[0];

    if (reply === 'timeout') {
      const error = new Error('The operation was aborted due to timeout');
      error.name = 'TimeoutError';
      return Promise.reject(error);
    }

    if (reply === 'refused' || reply === undefined) {
      return Promise.reject(new TypeError('fetch failed'));
    }

    const response: HealthResponse = { status: reply };

    return Promise.resolve(response);
  };

  return { fetch: fetchFn, requests };
}

/**
 * Sleep that returns immediately and records requested durations
 */
export function createRecordingSleep(): {
  sleep: (timeMS: number) => Promise<void>;
  sleeps: number[];
} {
  const sleeps: number[] = [];

  return {
    sleep: (timeMS) => {
      sleeps.push(timeMS);
      return Promise.resolve();
    },
    sleeps,
  };
}
