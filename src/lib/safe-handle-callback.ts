import { errorToString } from './error-to-string';
import { isPromise } from './type-guards';

export type CallbackErrorReporter = (
  callbackName: string,
  error: unknown,
) => void;

/**
 * Default reporter: writes the failure to stderr
 */
export const reportCallbackError: CallbackErrorReporter = (
  callbackName,
  error,
) => {
  // eslint-disable-next-line no-console
  console.error(
    `Error in a callback ${callbackName}:\n\n${errorToString(error)}`,
  );
};

/**
 * Calls a callback, catching sync throws and async rejections and handing
 * them to `onError`. Fire-and-forget: the callback's result is not awaited.
 */
export function safeHandleCallback<Args extends unknown[]>(
  callbackName: string,
  callback: (...args: Args) => unknown,
  args: Args,
  onError: CallbackErrorReporter = reportCallbackError,
): void {
  try {
    const result = callback(...args);

    if (isPromise(result)) {
      result.then(undefined, (error: unknown) => {
        onError(callbackName, error);
      });
    }
  } catch (error) {
    onError(callbackName, error);
  }
}
