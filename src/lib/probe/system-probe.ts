import type { CommandResult, CommandRunner } from '../command-runner';
import type {
  Binding,
  ContainerBinding,
  InstanceID,
  PortBinding,
  Probe,
} from './types';
import { ProbeFailedError } from './errors';

/**
 * Splits command output into non-empty trimmed lines, first occurrence wins
 */
export function parseIDList(output: string): InstanceID[] {
  const ids: InstanceID[] = [];

  for (const line of output.split('\n')) {
    const id = line.trim();

    if (id.length > 0 && !ids.includes(id)) {
      ids.push(id);
    }
  }

  return ids;
}

/**
 * Picks the ids of `docker ps --format '{{.ID}} {{.Names}}'` lines whose
 * name list contains `name` exactly
 */
export function parseContainerList(
  output: string,
  name: string,
): InstanceID[] {
  const ids: InstanceID[] = [];

  for (const line of output.split('\n')) {
    const [id, names = ''] = line.trim().split(/\s+/, 2);

    if (id && names.split(',').includes(name) && !ids.includes(id)) {
      ids.push(id);
    }
  }

  return ids;
}

/**
 * Resolves bindings with the host's own tools: `lsof` for ports and
 * `docker ps` for container names. Read-only.
 */
export class SystemProbe implements Probe {
  private runner: CommandRunner;

  constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  public find(binding: Binding): Promise<InstanceID[]> {
    return binding.kind === 'port'
      ? this.findListeners(binding)
      : this.findContainers(binding);
  }

  private async findListeners(binding: PortBinding): Promise<InstanceID[]> {
    const args = ['-t', '-i', `TCP:${binding.port}`, '-sTCP:LISTEN'];
    const result = await this.runProbe(binding, 'lsof', args);

    // lsof exits 1 when nothing matched
    if (result.exitCode === 1 && result.stdout.trim() === '') {
      return [];
    }

    if (result.exitCode !== 0) {
      throw new ProbeFailedError(binding, {
        command: 'lsof',
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
    }

    return parseIDList(result.stdout);
  }

  private async findContainers(
    binding: ContainerBinding,
  ): Promise<InstanceID[]> {
    // the name filter matches substrings; exact matching happens below
    const args = [
      'ps',
      '--format',
      '{{.ID}} {{.Names}}',
      '-f',
      `name=${binding.name}`,
    ];
    const result = await this.runProbe(binding, 'docker', args);

    if (result.exitCode !== 0) {
      throw new ProbeFailedError(binding, {
        command: 'docker',
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
    }

    return parseContainerList(result.stdout, binding.name);
  }

  private async runProbe(
    binding: Binding,
    command: string,
    args: string[],
  ): Promise<CommandResult> {
    try {
      return await this.runner.run({ command, args });
    } catch (error) {
      throw new ProbeFailedError(binding, { command }, error);
    }
  }
}
