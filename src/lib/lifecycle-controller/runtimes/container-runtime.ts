import { CurlyBrackets } from '../../curly-brackets';
import type { CommandResult, CommandRunner } from '../../command-runner';
import type { Binding, InstanceID, Probe } from '../../probe';
import { LaunchFailedError, SignalFailedError } from '../errors';
import type { LaunchOptions, ServiceRuntime, StopSignal } from '../types';

export interface ContainerRuntimeOptions {
  /** Image to run when no artifact is given */
  image: string;

  /**
   * Extra `docker run` arguments placed before the image, e.g.
   * `["-p", "8001:8001"]`. Templates over `buildID` and `artifact`.
   */
  runArgs?: string[];

  /** Passed to `docker stop -t` */
  stopTimeoutSeconds?: number;
  runner: CommandRunner;
  probe: Probe;
}

/** `docker ps` prints ids of this length */
const SHORT_ID_LENGTH = 12;

/**
 * Runs the service as a named container through the docker CLI
 */
export class ContainerRuntime implements ServiceRuntime {
  public readonly kind = 'container';

  private image: string;
  private runArgs: string[];
  private stopTimeoutSeconds?: number;
  private runner: CommandRunner;
  private probe: Probe;

  constructor(options: ContainerRuntimeOptions) {
    this.image = options.image;
    this.runArgs = options.runArgs ?? [];
    this.stopTimeoutSeconds = options.stopTimeoutSeconds;
    this.runner = options.runner;
    this.probe = options.probe;
  }

  public find(binding: Binding): Promise<InstanceID[]> {
    return this.probe.find(binding);
  }

  public async launch(
    binding: Binding,
    options: LaunchOptions = {},
  ): Promise<InstanceID> {
    if (binding.kind !== 'container') {
      throw new LaunchFailedError(
        'The container runtime needs a container binding',
        { binding: binding.kind },
      );
    }

    const locals = {
      buildID: options.artifact?.buildID ?? '',
      artifact: options.artifact?.reference ?? '',
    };
    const image = options.artifact?.reference ?? this.image;
    const args = [
      'run',
      '-d',
      '--rm',
      '--name',
      binding.name,
      ...this.runArgs.map((arg) => CurlyBrackets(arg, locals)),
      image,
    ];

    let result: CommandResult;

    try {
      result = await this.runner.run({ command: 'docker', args });
    } catch (error) {
      throw new LaunchFailedError('Could not run docker', { args }, error);
    }

    const id = result.stdout.trim();

    if (result.exitCode !== 0 || id === '') {
      throw new LaunchFailedError(
        `docker run exited with code ${result.exitCode}`,
        { image, stderr: result.stderr.trim() },
      );
    }

    return id.slice(0, SHORT_ID_LENGTH);
  }

  /**
   * SIGTERM maps to `docker stop` (which escalates after its own timeout);
   * other signals go through `docker kill --signal`
   */
  public async signal(id: InstanceID, signal: StopSignal): Promise<void> {
    const args =
      signal === 'SIGTERM'
        ? [
            'stop',
            ...(this.stopTimeoutSeconds === undefined
              ? []
              : ['-t', String(this.stopTimeoutSeconds)]),
            id,
          ]
        : ['kill', `--signal=${signal}`, id];

    let result: CommandResult;

    try {
      result = await this.runner.run({ command: 'docker', args });
    } catch (error) {
      throw new SignalFailedError({ instanceID: id, signal }, error);
    }

    if (result.exitCode === 0 || /no such container/i.test(result.stderr)) {
      return;
    }

    throw new SignalFailedError(
      { instanceID: id, signal },
      new Error(result.stderr.trim() || `docker exited with code ${result.exitCode}`),
    );
  }
}
