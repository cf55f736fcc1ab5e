import type { Logger, LoggerService } from '../logger';
import { EventEmitterProtected } from '../event-emitter';
import { HealthChecker } from '../health-checker';
import type { HealthPollOptions } from '../health-checker';
import { describeBinding } from '../probe';
import type { Binding, InstanceID } from '../probe';
import { sleep as defaultSleep } from '../sleep';
import type { SleepFunction } from '../sleep';
import {
  AlreadyRunningError,
  LaunchFailedError,
  StartUnconfirmedError,
  StopFailedError,
} from './errors';
import {
  DEFAULT_GRACE_PERIOD_MS,
  createEscalationLadder,
  validateEscalationLadder,
} from './escalation';
import type {
  EscalationStep,
  InstanceStatus,
  LifecycleControllerEvents,
  LifecycleControllerOptions,
  RestartResult,
  ServiceRuntime,
  SignalRecord,
  StartOptions,
  StartResult,
  StatusResult,
  StopResult,
} from './types';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Starts, stops and restarts the one service bound to a port or container
 * name. The binding is re-probed before every decision; `state` reflects
 * the last transition this controller observed.
 *
 * Expected outcomes (already running, unconfirmed start, stop failure) are
 * returned as results, never thrown.
 */
export class LifecycleController extends EventEmitterProtected<LifecycleControllerEvents> {
  public readonly binding: Binding;
  public readonly healthURL: string;
  public readonly escalation: readonly EscalationStep[];

  private runtime: ServiceRuntime;
  private healthChecker: HealthChecker;
  private healthOptions: HealthPollOptions;
  private sleep: SleepFunction;
  private logger: LoggerService;
  private _status: InstanceStatus = 'absent';

  constructor(rootLogger: Logger, options: LifecycleControllerOptions) {
    super();

    this.binding = options.binding;
    this.healthURL = options.healthURL;
    this.runtime = options.runtime;
    this.healthChecker = options.healthChecker ?? new HealthChecker();
    this.healthOptions = options.health ?? {};
    this.sleep = options.sleep ?? defaultSleep;
    this.escalation = validateEscalationLadder(
      options.escalation ??
        createEscalationLadder(
          options.gracePeriodMS ?? DEFAULT_GRACE_PERIOD_MS,
        ),
    );
    this.logger = rootLogger
      .service('lifecycle')
      .entity(describeBinding(options.binding));
  }

  public get state(): InstanceStatus {
    return this._status;
  }

  public get logFile(): string | undefined {
    return this.runtime.logFile;
  }

  public async start(options: StartOptions = {}): Promise<StartResult> {
    const replace = options.replace ?? false;
    const verifyHealth = options.verifyHealth ?? true;

    let existing: InstanceID[];

    try {
      existing = await this.runtime.find(this.binding);
    } catch (error) {
      return this.probeFailedStart(error);
    }

    let replaced: StopResult | undefined;

    if (existing.length > 0) {
      if (!replace) {
        this.setStatus('running');
        this.logger.warn('Already running as {{ids}}', {
          params: { ids: existing.join(', ') },
        });

        return {
          success: false,
          code: 'already_running',
          reason: 'The binding is already occupied',
          error: new AlreadyRunningError({
            binding: describeBinding(this.binding),
            instanceIDs: existing,
          }),
          fatal: false,
          instance: { id: existing[0], binding: this.binding, status: 'running' },
        };
      }

      this.logger.notice('Replacing running instance {{ids}}', {
        params: { ids: existing.join(', ') },
      });

      replaced = await this.stop();

      if (!replaced.success) {
        return {
          success: false,
          code: 'stop_failed',
          reason: 'The previous instance could not be stopped',
          error: replaced.error,
          fatal: true,
          replaced,
        };
      }
    }

    this.setStatus('starting');

    let launchedID: InstanceID;

    try {
      launchedID = await this.runtime.launch(this.binding, {
        artifact: options.artifact,
      });
    } catch (error) {
      const launchError =
        error instanceof LaunchFailedError
          ? error
          : new LaunchFailedError(toError(error).message, {}, error);

      this.logger.errorObject('Launch failed', launchError);
      this.setStatus('absent');

      return {
        success: false,
        code: 'launch_failed',
        reason: launchError.message,
        error: launchError,
        fatal: true,
        replaced,
      };
    }

    this.logger.info('Launched instance {{id}}', { params: { id: launchedID } });

    if (!verifyHealth) {
      return {
        success: true,
        fatal: false,
        instance: { id: launchedID, binding: this.binding, status: 'starting' },
        replaced,
      };
    }

    const health = await this.healthChecker.poll(
      this.healthURL,
      this.healthOptions,
    );

    if (health.outcome !== 'healthy') {
      this.logger.warn(
        'Instance {{id}} did not report healthy at {{url}} after {{attempts}} attempt(s); leaving it running',
        {
          params: {
            id: launchedID,
            url: this.healthURL,
            attempts: health.attempts,
          },
        },
      );

      return {
        success: false,
        code: 'start_unconfirmed',
        reason: `Health check ${health.outcome} after ${health.attempts} attempt(s)`,
        error: new StartUnconfirmedError({
          healthURL: this.healthURL,
          attempts: health.attempts,
        }),
        fatal: false,
        instance: { id: launchedID, binding: this.binding, status: 'starting' },
        health,
        replaced,
      };
    }

    const id = await this.confirmInstanceID(launchedID);
    this.setStatus('running');
    this.logger.success('Instance {{id}} is healthy after {{attempts}} attempt(s)', {
      params: { id, attempts: health.attempts },
    });

    return {
      success: true,
      fatal: false,
      instance: { id, binding: this.binding, status: 'running' },
      health,
      replaced,
    };
  }

  /**
   * Walk the escalation ladder until the binding is free. Stopping a free
   * binding succeeds without sending anything.
   */
  public async stop(): Promise<StopResult> {
    let remaining: InstanceID[];

    try {
      remaining = await this.runtime.find(this.binding);
    } catch (error) {
      return this.probeFailedStop(error, false, [], []);
    }

    if (remaining.length === 0) {
      this.logger.info('Nothing to stop');
      this.setStatus('absent');

      return {
        success: true,
        fatal: false,
        wasRunning: false,
        stoppedIDs: [],
        remainingIDs: [],
        signalsSent: [],
      };
    }

    const initialIDs = [...remaining];
    const signalsSent: SignalRecord[] = [];

    this.setStatus('stopping');

    for (const step of this.escalation) {
      for (const id of remaining) {
        signalsSent.push(await this.sendSignal(id, step));
      }

      await this.sleep(step.waitMS);

      try {
        remaining = await this.runtime.find(this.binding);
      } catch (error) {
        return this.probeFailedStop(error, true, initialIDs, signalsSent);
      }

      if (remaining.length === 0) {
        this.setStatus('stopped');
        this.logger.success('Stopped {{ids}}', {
          params: { ids: initialIDs.join(', ') },
        });

        return {
          success: true,
          fatal: false,
          wasRunning: true,
          stoppedIDs: initialIDs,
          remainingIDs: [],
          signalsSent,
        };
      }

      this.logger.warn('Still running after {{signal}}: {{ids}}', {
        params: { signal: step.signal, ids: remaining.join(', ') },
      });
    }

    const error = new StopFailedError({
      binding: describeBinding(this.binding),
      remainingIDs: remaining,
    });

    this.logger.errorObject('Stop failed', error);

    return {
      success: false,
      code: 'stop_failed',
      reason: error.message,
      error,
      fatal: true,
      wasRunning: true,
      stoppedIDs: initialIDs.filter((id) => !remaining.includes(id)),
      remainingIDs: remaining,
      signalsSent,
    };
  }

  /**
   * Stop, then start. A failed stop aborts before anything is launched.
   */
  public async restart(
    options: Omit<StartOptions, 'replace'> = {},
  ): Promise<RestartResult> {
    const stop = await this.stop();

    if (!stop.success) {
      return {
        success: false,
        code: 'stop_failed',
        reason: stop.reason,
        error: stop.error,
        fatal: true,
        stop,
      };
    }

    const start = await this.start({ ...options, replace: false });

    return {
      success: start.success,
      code: start.code,
      reason: start.reason,
      error: start.error,
      fatal: start.fatal,
      stop,
      start,
    };
  }

  /**
   * Probe the binding. A `starting` instance that now answers the probe
   * stays `starting`; anything else follows the probe.
   */
  public async status(): Promise<StatusResult> {
    const instanceIDs = await this.runtime.find(this.binding);

    if (instanceIDs.length === 0) {
      if (this._status !== 'stopped') {
        this.setStatus('absent');
      }
    } else if (this._status !== 'starting') {
      this.setStatus('running');
    }

    return { binding: this.binding, status: this._status, instanceIDs };
  }

  private async sendSignal(
    id: InstanceID,
    step: EscalationStep,
  ): Promise<SignalRecord> {
    this.logger.info('Sending {{signal}} to {{id}}', {
      params: { signal: step.signal, id },
    });

    try {
      await this.runtime.signal(id, step.signal);
      return { id, signal: step.signal };
    } catch (error) {
      // the re-probe decides whether the instance is gone
      this.logger.errorObject(`Could not send ${step.signal} to ${id}`, error);
      return { id, signal: step.signal, error: toError(error).message };
    }
  }

  private async confirmInstanceID(launchedID: InstanceID): Promise<InstanceID> {
    try {
      const current = await this.runtime.find(this.binding);
      return current[0] ?? launchedID;
    } catch (error) {
      this.logger.errorObject('Could not re-probe after start', error);
      return launchedID;
    }
  }

  private probeFailedStart(error: unknown): StartResult {
    const probeError = toError(error);
    this.logger.errorObject('Probe failed', probeError);

    return {
      success: false,
      code: 'probe_failed',
      reason: probeError.message,
      error: probeError,
      fatal: true,
    };
  }

  private probeFailedStop(
    error: unknown,
    wasRunning: boolean,
    initialIDs: InstanceID[],
    signalsSent: SignalRecord[],
  ): StopResult {
    const probeError = toError(error);
    this.logger.errorObject('Probe failed', probeError);

    return {
      success: false,
      code: 'probe_failed',
      reason: probeError.message,
      error: probeError,
      fatal: true,
      wasRunning,
      stoppedIDs: [],
      remainingIDs: initialIDs,
      signalsSent,
    };
  }

  private setStatus(to: InstanceStatus): void {
    const from = this._status;

    if (from === to) {
      return;
    }

    this._status = to;
    this.logger.debug('State {{from}} -> {{to}}', { params: { from, to } });
    this.emit('state-change', { binding: this.binding, from, to });
  }
}
