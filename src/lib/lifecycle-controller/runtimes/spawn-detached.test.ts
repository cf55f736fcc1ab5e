import { promises as fsPromises } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { spawnDetached } from './spawn-detached';

async function waitForContent(
  filePath: string,
  expected: string,
): Promise<string> {
  const deadline = Date.now() + 5_000;
  let content = '';

  while (Date.now() < deadline) {
    content = await fsPromises.readFile(filePath, 'utf8');

    if (content === expected) {
      return content;
    }

    await new Promise((resolve) => setTimeout(resolve, 25));
  }

  return content;
}

describe('spawnDetached', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'spawn-detached-'));
  });

  afterEach(async () => {
    await fsPromises.rm(dir, { recursive: true, force: true });
  });

  test('returns the pid and appends output to the log file', async () => {
    const logFile = path.join(dir, 'logs', 'backend.log');
    await fsPromises.mkdir(path.dirname(logFile));
    await fsPromises.writeFile(logFile, 'previous run\n');

    const pid = await spawnDetached({
      command: 'sh',
      args: ['-c', 'echo "started $APP_ENV"; echo warning >&2'],
      env: { APP_ENV: 'production' },
      logFile,
    });

    expect(Number.isInteger(pid)).toBe(true);
    expect(pid).toBeGreaterThan(0);
    expect(
      await waitForContent(logFile, 'previous run\nstarted production\nwarning\n'),
    ).toBe('previous run\nstarted production\nwarning\n');
  });

  test('creates the log directory', async () => {
    const logFile = path.join(dir, 'nested', 'runs', 'backend.log');

    await spawnDetached({ command: 'sh', args: ['-c', 'echo up'], logFile });

    expect(await waitForContent(logFile, 'up\n')).toBe('up\n');
  });

  test('rejects when the binary does not exist', async () => {
    await expect(
      spawnDetached({
        command: 'no-such-bin-x',
        args: [],
        logFile: path.join(dir, 'backend.log'),
      }),
    ).rejects.toThrow('ENOENT');
  });
});
