import type { StopSignal } from './types';

/**
 * Error thrown when a new instance could not be launched
 */
export class LaunchFailedError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Launch';
  public errCode = 'LaunchFailed';
  public additionalInfo: Record<string, unknown>;
  public cause?: unknown;

  constructor(
    message: string,
    additionalInfo: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message);
    this.name = 'LaunchFailedError';
    this.additionalInfo = additionalInfo;
    this.cause = cause;
  }
}

/**
 * Error thrown when a signal could not be delivered to a live instance
 */
export class SignalFailedError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Signal';
  public errCode = 'SignalFailed';
  public additionalInfo: { instanceID: string; signal: StopSignal };
  public cause?: unknown;

  constructor(
    additionalInfo: { instanceID: string; signal: StopSignal },
    cause?: unknown,
  ) {
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Could not send ${additionalInfo.signal} to ${additionalInfo.instanceID}${causeMessage}`,
    );
    this.name = 'SignalFailedError';
    this.additionalInfo = additionalInfo;
    this.cause = cause;
  }
}

/**
 * The binding is still occupied after every escalation step
 */
export class StopFailedError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Stop';
  public errCode = 'StopFailed';
  public additionalInfo: { binding: string; remainingIDs: string[] };

  constructor(additionalInfo: { binding: string; remainingIDs: string[] }) {
    super(
      `${additionalInfo.binding} is still held by ${additionalInfo.remainingIDs.join(', ')} after every stop signal`,
    );
    this.name = 'StopFailedError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * The binding was occupied and replacing was not requested
 */
export class AlreadyRunningError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Start';
  public errCode = 'AlreadyRunning';
  public additionalInfo: { binding: string; instanceIDs: string[] };

  constructor(additionalInfo: { binding: string; instanceIDs: string[] }) {
    super(
      `${additionalInfo.binding} is already held by ${additionalInfo.instanceIDs.join(', ')}`,
    );
    this.name = 'AlreadyRunningError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * The instance launched but never reported healthy. It is left running.
 */
export class StartUnconfirmedError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Start';
  public errCode = 'StartUnconfirmed';
  public additionalInfo: { healthURL: string; attempts: number };

  constructor(additionalInfo: { healthURL: string; attempts: number }) {
    super(
      `Instance did not report healthy at ${additionalInfo.healthURL} after ${additionalInfo.attempts} attempt(s)`,
    );
    this.name = 'StartUnconfirmedError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown for an escalation ladder that cannot be used
 */
export class InvalidEscalationError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Config';
  public errCode = 'InvalidEscalation';
  public additionalInfo: Record<string, unknown>;

  constructor(message: string, additionalInfo: Record<string, unknown> = {}) {
    super(message);
    this.name = 'InvalidEscalationError';
    this.additionalInfo = additionalInfo;
  }
}
