import { promises as fsPromises } from 'fs';
import path from 'path';
import { CurlyBrackets } from '../../curly-brackets';
import type { Binding, InstanceID, Probe } from '../../probe';
import { LaunchFailedError, SignalFailedError } from '../errors';
import type { LaunchOptions, ServiceRuntime, StopSignal } from '../types';
import { spawnDetached } from './spawn-detached';
import type { DetachedSpawner } from './spawn-detached';

export type KillFunction = (pid: number, signal: StopSignal) => void;

export interface ProcessRuntimeOptions {
  /**
   * argv of the service, e.g. `["uvicorn", "main:app", "--port", "{{port}}"]`.
   * Each part is a template over `port`, `buildID` and `artifact`.
   */
  command: string[];
  cwd?: string;
  env?: Record<string, string>;

  /** Relative paths resolve against `cwd` */
  logFile: string;

  probe: Probe;
  spawner?: DetachedSpawner;
  kill?: KillFunction;
}

function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Runs the service as a detached child process found by its listening port
 */
export class ProcessRuntime implements ServiceRuntime {
  public readonly kind = 'process';
  public readonly logFile: string;

  private command: string[];
  private cwd?: string;
  private env?: Record<string, string>;
  private probe: Probe;
  private spawner: DetachedSpawner;
  private kill: KillFunction;

  constructor(options: ProcessRuntimeOptions) {
    if (options.command.length === 0) {
      throw new LaunchFailedError('Process runtime needs a command');
    }

    this.command = options.command;
    this.cwd = options.cwd;
    this.env = options.env;
    this.logFile = path.resolve(options.cwd ?? process.cwd(), options.logFile);
    this.probe = options.probe;
    this.spawner = options.spawner ?? spawnDetached;
    this.kill = options.kill ?? ((pid, signal) => process.kill(pid, signal));
  }

  public find(binding: Binding): Promise<InstanceID[]> {
    return this.probe.find(binding);
  }

  public async launch(
    binding: Binding,
    options: LaunchOptions = {},
  ): Promise<InstanceID> {
    if (this.cwd !== undefined) {
      await this.assertDirectory(this.cwd);
    }

    const locals = {
      port: binding.kind === 'port' ? binding.port : '',
      buildID: options.artifact?.buildID ?? '',
      artifact: options.artifact?.reference ?? '',
    };
    const [command, ...args] = this.command.map((part) =>
      CurlyBrackets(part, locals),
    );

    try {
      const pid = await this.spawner({
        command,
        args,
        cwd: this.cwd,
        env: this.env,
        logFile: this.logFile,
      });

      return String(pid);
    } catch (error) {
      throw new LaunchFailedError(
        `Could not launch "${command}"`,
        { command, args, logFile: this.logFile },
        error,
      );
    }
  }

  public signal(id: InstanceID, signal: StopSignal): Promise<void> {
    const pid = Number(id);

    if (!Number.isInteger(pid) || pid <= 0) {
      return Promise.reject(
        new SignalFailedError(
          { instanceID: id, signal },
          new Error('not a process id'),
        ),
      );
    }

    try {
      this.kill(pid, signal);
    } catch (error) {
      // ESRCH: already exited
      if (!isErrorWithCode(error, 'ESRCH')) {
        return Promise.reject(
          new SignalFailedError({ instanceID: id, signal }, error),
        );
      }
    }

    return Promise.resolve();
  }

  private async assertDirectory(directory: string): Promise<void> {
    const stats = await fsPromises.stat(directory).catch(() => null);

    if (!stats || !stats.isDirectory()) {
      throw new LaunchFailedError(
        `Working directory "${directory}" does not exist`,
        { cwd: directory },
      );
    }
  }
}
