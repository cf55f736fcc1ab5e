import { spawn } from 'child_process';
import { promises as fsPromises } from 'fs';
import path from 'path';

export interface DetachedProcessSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;

  /** stdout and stderr are appended here */
  logFile: string;
}

/**
 * Starts a process that outlives this one and returns its pid
 */
export type DetachedSpawner = (spec: DetachedProcessSpec) => Promise<number>;

export const spawnDetached: DetachedSpawner = async (spec) => {
  await fsPromises.mkdir(path.dirname(spec.logFile), { recursive: true });
  const handle = await fsPromises.open(spec.logFile, 'a');

  try {
    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      detached: true,
      stdio: ['ignore', handle.fd, handle.fd],
    });

    const pid = await new Promise<number>((resolve, reject) => {
      child.once('error', reject);
      child.once('spawn', () => {
        if (child.pid === undefined) {
          reject(new Error(`No pid for "${spec.command}"`));
          return;
        }

        resolve(child.pid);
      });
    });

    child.unref();

    return pid;
  } finally {
    // the child keeps its own copy of the descriptor
    await handle.close();
  }
};
