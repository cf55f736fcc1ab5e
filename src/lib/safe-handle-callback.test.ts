import { describe, expect, it } from 'vitest';
import { safeHandleCallback } from './safe-handle-callback';
import { sleep } from './sleep';

function createReporter() {
  const reports: { callbackName: string; message: string }[] = [];

  return {
    reports,
    onError: (callbackName: string, error: unknown) => {
      reports.push({
        callbackName,
        message: error instanceof Error ? error.message : String(error),
      });
    },
  };
}

describe('safeHandleCallback', () => {
  it('should call a synchronous callback with its arguments', () => {
    let resultSaved = 0;

    safeHandleCallback(
      'syncCallback',
      (a: number, b: number) => {
        resultSaved = a + b;
      },
      [5, 10],
    );

    expect(resultSaved).toBe(15);
  });

  it('should report a synchronous throw without rethrowing', () => {
    const { reports, onError } = createReporter();

    expect(() =>
      safeHandleCallback(
        'syncCallbackWithError',
        () => {
          throw new Error('Sync error');
        },
        [],
        onError,
      ),
    ).not.toThrow();

    expect(reports).toEqual([
      { callbackName: 'syncCallbackWithError', message: 'Sync error' },
    ]);
  });

  it('should report an async rejection', async () => {
    const { reports, onError } = createReporter();

    safeHandleCallback(
      'asyncCallbackWithError',
      async () => {
        await sleep(1);
        throw new Error('Async error');
      },
      [],
      onError,
    );

    while (reports.length === 0) {
      await sleep(1);
    }

    expect(reports).toEqual([
      { callbackName: 'asyncCallbackWithError', message: 'Async error' },
    ]);
  });
});
