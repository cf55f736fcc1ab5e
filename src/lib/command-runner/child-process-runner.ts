import { spawn } from 'child_process';
import type { CommandResult, CommandRunner, CommandSpec } from './types';
import { CommandSpawnError } from './errors';

/**
 * CommandRunner backed by `child_process.spawn` (no shell). Output is
 * buffered in memory and returned once the process closes.
 */
export class ChildProcessCommandRunner implements CommandRunner {
  public run(spec: CommandSpec): Promise<CommandResult> {
    const args = spec.args ?? [];

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(spec.command, args, {
        cwd: spec.cwd,
        env: spec.env ? { ...process.env, ...spec.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: spec.timeoutMS,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.once('error', (error) => {
        reject(new CommandSpawnError({ command: spec.command, args }, error));
      });

      child.once('close', (code, signal) => {
        resolve({
          exitCode: code ?? -1,
          signal,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      });
    });
  }
}
