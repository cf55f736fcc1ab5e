import type { Binding, InstanceID } from '../probe';
import type {
  HealthChecker,
  HealthCheckResult,
  HealthPollOptions,
} from '../health-checker';
import type { SleepFunction } from '../sleep';

export type InstanceStatus =
  | 'absent'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped';

export type StopSignal = 'SIGTERM' | 'SIGINT' | 'SIGHUP' | 'SIGQUIT' | 'SIGKILL';

/**
 * One rung of the stop ladder: send `signal` to every matched instance,
 * then wait `waitMS` before probing again.
 */
export interface EscalationStep {
  signal: StopSignal;
  waitMS: number;
}

/**
 * A deployable build output. `reference` is what the runtime launches:
 * an image tag for containers, a path or version for bare processes.
 */
export interface Artifact {
  buildID: string;
  reference: string;
}

export interface LaunchOptions {
  artifact?: Artifact;
}

/**
 * Host-specific mechanics behind the controller
 */
export interface ServiceRuntime {
  readonly kind: 'process' | 'container';

  find(binding: Binding): Promise<InstanceID[]>;

  /**
   * Launch a new instance and return its id. Throws LaunchFailedError.
   */
  launch(binding: Binding, options?: LaunchOptions): Promise<InstanceID>;

  /**
   * Deliver a signal. An instance that is already gone is not an error;
   * throws SignalFailedError otherwise.
   */
  signal(id: InstanceID, signal: StopSignal): Promise<void>;

  /** Where the instance's output goes, when the runtime captures it */
  readonly logFile?: string;
}

export interface ServiceInstance {
  id: InstanceID;
  binding: Binding;
  status: InstanceStatus;
}

export interface BaseOperationResult {
  /** Whether the operation succeeded */
  success: boolean;

  /** Human-readable explanation if !success */
  reason?: string;

  /** Underlying error if applicable */
  error?: Error;

  /**
   * True when the caller must treat the failure as unrecoverable. Always
   * false on success.
   */
  fatal: boolean;
}

export type StartFailureCode =
  | 'already_running'
  | 'stop_failed'
  | 'launch_failed'
  | 'start_unconfirmed'
  | 'probe_failed';

export type StopFailureCode = 'stop_failed' | 'probe_failed';

export interface StartOptions {
  /** Stop whatever holds the binding first instead of refusing */
  replace?: boolean;

  /**
   * Poll the health endpoint before reporting success. When false the
   * result is a success with the instance still `starting`.
   */
  verifyHealth?: boolean;
  artifact?: Artifact;
}

export interface StartResult extends BaseOperationResult {
  code?: StartFailureCode;
  instance?: ServiceInstance;
  health?: HealthCheckResult;

  /** Present when a replace had to stop a previous instance */
  replaced?: StopResult;
}

export interface SignalRecord {
  id: InstanceID;
  signal: StopSignal;
  error?: string;
}

export interface StopResult extends BaseOperationResult {
  code?: StopFailureCode;

  /** Whether anything held the binding when the stop began */
  wasRunning: boolean;
  stoppedIDs: InstanceID[];
  remainingIDs: InstanceID[];
  signalsSent: SignalRecord[];
}

export interface RestartResult extends BaseOperationResult {
  code?: StartFailureCode;
  stop: StopResult;

  /** Absent when the stop failed and no start was attempted */
  start?: StartResult;
}

export interface StatusResult {
  binding: Binding;
  status: InstanceStatus;
  instanceIDs: InstanceID[];
}

export interface LifecycleControllerEvents {
  'state-change': {
    binding: Binding;
    from: InstanceStatus;
    to: InstanceStatus;
  };
}

export interface LifecycleControllerOptions {
  binding: Binding;
  runtime: ServiceRuntime;
  healthURL: string;
  health?: HealthPollOptions;

  /** Wait after the graceful signal. Ignored when `escalation` is given. */
  gracePeriodMS?: number;
  escalation?: EscalationStep[];

  healthChecker?: HealthChecker;
  sleep?: SleepFunction;
}
