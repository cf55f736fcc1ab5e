/**
 * Function shape used wherever a component waits between steps, so the
 * wait can be swapped for a recording fake in tests.
 */
export type SleepFunction = (timeMS: number) => Promise<void>;

/**
 * Sleeps for the specified number of milliseconds
 *
 *  ```typescript
 * await sleep(2000);
 * ```
 */

export const sleep: SleepFunction = async (timeMS: number): Promise<void> => {
  if (timeMS <= 0) {
    return;
  }

  return new Promise<void>(function (resolve) {
    setTimeout(function () {
      resolve();
    }, timeMS);
  });
};
