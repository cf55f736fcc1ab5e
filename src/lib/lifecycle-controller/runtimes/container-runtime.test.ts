import { describe, expect, test } from 'vitest';
import { SystemProbe } from '../../probe';
import { TestCommandRunner } from '../../command-runner/test-command-runner';
import { LaunchFailedError, SignalFailedError } from '../errors';
import { ContainerRuntime } from './container-runtime';

const FULL_ID =
  '3f2a9c1b7d4e8a6f5c2b1e0d9c8b7a6f5e4d3c2b1a0f9e8d7c6b5a4f3e2d1c0b';

function createRuntime(runner: TestCommandRunner, stopTimeoutSeconds?: number) {
  return new ContainerRuntime({
    image: 'stock-api:latest',
    runArgs: ['-p', '8001:8001', '-e', 'BUILD_ID={{buildID}}'],
    stopTimeoutSeconds,
    runner,
    probe: new SystemProbe(runner),
  });
}

describe('ContainerRuntime', () => {
  test('runs a detached, named container and returns the short id', async () => {
    const runner = new TestCommandRunner().respond('docker run', {
      stdout: `${FULL_ID}\n`,
    });
    const runtime = createRuntime(runner);

    const id = await runtime.launch({ kind: 'container', name: 'stock-api' });

    expect(id).toBe('3f2a9c1b7d4e');
    expect(runner.commandLines()).toEqual([
      'docker run -d --rm --name stock-api -p 8001:8001 -e BUILD_ID= stock-api:latest',
    ]);
  });

  test('runs the artifact image when one is given', async () => {
    const runner = new TestCommandRunner().respond('docker run', {
      stdout: FULL_ID,
    });
    const runtime = createRuntime(runner);

    await runtime.launch(
      { kind: 'container', name: 'stock-api' },
      { artifact: { buildID: 'b7', reference: 'stock-api:b7' } },
    );

    expect(runner.commandLines()).toEqual([
      'docker run -d --rm --name stock-api -p 8001:8001 -e BUILD_ID=b7 stock-api:b7',
    ]);
  });

  test('a failing docker run is a launch failure', async () => {
    const runner = new TestCommandRunner().respond('docker run', {
      exitCode: 125,
      stderr: 'Unable to find image\n',
    });
    const runtime = createRuntime(runner);

    const error = await runtime
      .launch({ kind: 'container', name: 'stock-api' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LaunchFailedError);

    if (error instanceof LaunchFailedError) {
      expect(error.message).toBe('docker run exited with code 125');
      expect(error.additionalInfo).toEqual({
        image: 'stock-api:latest',
        stderr: 'Unable to find image',
      });
    }
  });

  test('needs a container binding', async () => {
    const runtime = createRuntime(new TestCommandRunner());

    await expect(
      runtime.launch({ kind: 'port', port: 8001 }),
    ).rejects.toThrow('The container runtime needs a container binding');
  });

  test('SIGTERM maps to docker stop', async () => {
    const runner = new TestCommandRunner();
    const runtime = createRuntime(runner, 5);

    await runtime.signal('3f2a9c1b7d4e', 'SIGTERM');

    expect(runner.commandLines()).toEqual(['docker stop -t 5 3f2a9c1b7d4e']);
  });

  test('other signals map to docker kill', async () => {
    const runner = new TestCommandRunner();
    const runtime = createRuntime(runner);

    await runtime.signal('3f2a9c1b7d4e', 'SIGKILL');

    expect(runner.commandLines()).toEqual([
      'docker kill --signal=SIGKILL 3f2a9c1b7d4e',
    ]);
  });

  test('a container that is already gone counts as stopped', async () => {
    const runner = new TestCommandRunner().respond('docker stop', {
      exitCode: 1,
      stderr: 'Error response from daemon: No such container: 3f2a9c1b7d4e',
    });
    const runtime = createRuntime(runner);

    await expect(
      runtime.signal('3f2a9c1b7d4e', 'SIGTERM'),
    ).resolves.toBeUndefined();
  });

  test('other docker errors are SignalFailedError', async () => {
    const runner = new TestCommandRunner().respond('docker kill', {
      exitCode: 1,
      stderr: 'permission denied',
    });
    const runtime = createRuntime(runner);

    await expect(
      runtime.signal('3f2a9c1b7d4e', 'SIGKILL'),
    ).rejects.toBeInstanceOf(SignalFailedError);
  });
});
