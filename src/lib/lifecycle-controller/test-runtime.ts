/**
 * In-memory ServiceRuntime for controller, pipeline and CLI tests. Nothing
 * is spawned; instances are entries in a list.
 */

import type { Binding, InstanceID } from '../probe';
import { LaunchFailedError, SignalFailedError } from './errors';
import type {
  LaunchOptions,
  ServiceRuntime,
  StopSignal,
} from './types';

export interface TestRuntimeOptions {
  /** Instances already holding the binding */
  running?: InstanceID[];

  /** Signals the instances survive, e.g. `['SIGTERM']` for a stuck service */
  ignoredSignals?: StopSignal[];

  /** Fail the next launch with this message */
  launchError?: string;

  /** Make `signal` throw for these signals even though the instance lives */
  failingSignals?: StopSignal[];
  logFile?: string;
}

export class TestRuntime implements ServiceRuntime {
  public readonly kind = 'process';
  public readonly logFile?: string;

  public running: InstanceID[];
  public ignoredSignals: Set<StopSignal>;
  public failingSignals: Set<StopSignal>;
  public launchError?: string;
  public probeError?: Error;

  public launches: LaunchOptions[] = [];
  public signals: { id: InstanceID; signal: StopSignal }[] = [];
  public findCount = 0;

  private nextID = 5000;

  constructor(options: TestRuntimeOptions = {}) {
    this.running = [...(options.running ?? [])];
    this.ignoredSignals = new Set(options.ignoredSignals ?? []);
    this.failingSignals = new Set(options.failingSignals ?? []);
    this.launchError = options.launchError;
    this.logFile = options.logFile;
  }

  public find(_binding: Binding): Promise<InstanceID[]> {
    this.findCount++;

    if (this.probeError) {
      return Promise.reject(this.probeError);
    }

    return Promise.resolve([...this.running]);
  }

  public launch(_binding: Binding, options: LaunchOptions = {}): Promise<InstanceID> {
    this.launches.push(options);

    if (this.launchError !== undefined) {
      return Promise.reject(
        new LaunchFailedError(this.launchError, { runtime: 'test' }),
      );
    }

    const id = String(this.nextID++);
    this.running.push(id);

    return Promise.resolve(id);
  }

  public signal(id: InstanceID, signal: StopSignal): Promise<void> {
    this.signals.push({ id, signal });

    if (this.failingSignals.has(signal)) {
      return Promise.reject(
        new SignalFailedError({ instanceID: id, signal }, new Error('EPERM')),
      );
    }

    if (!this.ignoredSignals.has(signal)) {
      this.running = this.running.filter((runningID) => runningID !== id);
    }

    return Promise.resolve();
  }
}
