import { promises as fsPromises } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { Logger } from '../logger';
import { HealthChecker } from '../health-checker';
import {
  createRecordingSleep,
  createTestFetch,
} from '../health-checker/test-fetch';
import type { ScriptedHealthReply } from '../health-checker/test-fetch';
import { LifecycleController } from '../lifecycle-controller';
import { TestRuntime } from '../lifecycle-controller/test-runtime';
import { TestCommandRunner } from '../command-runner/test-command-runner';
import { isRunID } from '../id-helpers';
import { LocalDeployer } from './deployers';
import { PipelineOrchestrator } from './pipeline-orchestrator';
import { createDeploymentStages } from './stages';
import type { Notifier, RunNotification, StageDefinition } from './types';

function createRecordingNotifier(): Notifier & {
  notifications: RunNotification[];
} {
  const notifications: RunNotification[] = [];

  return {
    name: 'recording',
    notifications,
    notify: (notification) => {
      notifications.push(notification);
      return Promise.resolve();
    },
  };
}

function createDeploymentPipeline(
  options: {
    runner?: TestCommandRunner;
    runtime?: TestRuntime;
    replies?: ScriptedHealthReply[];
    strictBestEffort?: boolean;
    runLogDirectory?: string;
    notifier?: Notifier;
  } = {},
) {
  const { logger, arraySink } = Logger.createTestOptimizedLogger();
  const runner = options.runner ?? new TestCommandRunner();
  const runtime = options.runtime ?? new TestRuntime();
  const { fetch } = createTestFetch(options.replies ?? [200]);
  const healthChecker = new HealthChecker({
    fetch,
    sleep: createRecordingSleep().sleep,
  });

  const controller = new LifecycleController(logger, {
    binding: { kind: 'port', port: 8001 },
    runtime,
    healthURL: 'http://localhost:8001/health',
    healthChecker,
    sleep: createRecordingSleep().sleep,
  });

  const stages = createDeploymentStages({
    runner,
    commands: {
      checkout: [{ command: 'git', args: ['pull', 'origin', '{{branch}}'] }],
      staticCheck: [{ command: 'npm', args: ['run', 'lint'] }],
      test: [{ command: 'npm', args: ['test'] }],
      buildArtifact: [
        { command: 'docker', args: ['build', '-t', 'stock-api:{{buildID}}', '.'] },
      ],
    },
    artifactReference: 'stock-api:{{buildID}}',
    deployer: new LocalDeployer(controller),
    target: {
      name: 'local',
      host: 'localhost',
      endpoint: 'http://localhost:8001',
      healthURL: 'http://localhost:8001/health',
    },
    healthChecker,
    health: { maxAttempts: 3, intervalMS: 10 },
  });

  const notifier = options.notifier ?? createRecordingNotifier();
  const orchestrator = new PipelineOrchestrator(logger, {
    stages,
    notifier,
    strictBestEffort: options.strictBestEffort,
    runLogDirectory: options.runLogDirectory,
    endpoint: 'http://localhost:8001',
    branch: 'main',
  });

  return { orchestrator, runner, runtime, arraySink, notifier };
}

describe('PipelineOrchestrator', () => {
  const tmpDirs: string[] = [];

  afterEach(async () => {
    for (const dir of tmpDirs.splice(0)) {
      await fsPromises.rm(dir, { recursive: true, force: true });
    }
  });

  test('a successful run replaces the old instance and reports the endpoint', async () => {
    const notifier = createRecordingNotifier();
    const { orchestrator, runner, runtime } = createDeploymentPipeline({
      runtime: new TestRuntime({ running: ['4242'] }),
      notifier,
    });

    const run = await orchestrator.run({ type: 'manual' }, { buildID: 'b42' });

    expect(run.status).toBe('success');
    expect(isRunID(run.id)).toBe(true);
    expect(run.buildID).toBe('b42');
    expect(run.endpoint).toBe('http://localhost:8001');
    expect(run.artifact).toEqual({ buildID: 'b42', reference: 'stock-api:b42' });
    expect(run.stages.map((s) => s.outcome)).toEqual([
      'success',
      'success',
      'success',
      'success',
      'success',
      'success',
      'success',
    ]);
    expect(runner.commandLines()).toEqual([
      'git pull origin main',
      'npm run lint',
      'npm test',
      'docker build -t stock-api:b42 .',
    ]);
    expect(runtime.signals).toEqual([{ id: '4242', signal: 'SIGTERM' }]);
    expect(runtime.launches).toEqual([
      { artifact: { buildID: 'b42', reference: 'stock-api:b42' } },
    ]);
    expect(run.stages[5].summary).toBe('instance 5000');
    expect(notifier.notifications).toHaveLength(1);
    expect(notifier.notifications[0]).toMatchObject({
      runID: run.id,
      status: 'success',
      endpoint: 'http://localhost:8001',
    });
  });

  test('a blocking failure skips the rest; best-effort failures only warn', async () => {
    const notifier = createRecordingNotifier();
    const runner = new TestCommandRunner()
      .respond('npm run lint', { exitCode: 1, stderr: 'lint errors\n' })
      .respond('docker build', { exitCode: 1, stderr: 'no space left\n' });
    const runtime = new TestRuntime({ running: ['4242'] });
    const { orchestrator, arraySink } = createDeploymentPipeline({
      runner,
      runtime,
      notifier,
    });

    const run = await orchestrator.run({ type: 'manual' }, { buildID: 'b42' });

    expect(run.status).toBe('failure');
    expect(run.failedStage).toBe('build-artifact');
    expect(run.endpoint).toBeUndefined();
    expect(run.stages.map((s) => `${s.name}:${s.outcome}`)).toEqual([
      'checkout:success',
      'static-check:failure',
      'test:success',
      'build-artifact:failure',
      'stop-old-instance:skipped',
      'deploy-new-instance:skipped',
      'health-check-new-instance:skipped',
    ]);
    expect(run.stages[4].startedAt).toBeNull();
    expect(runtime.signals).toEqual([]);
    expect(runtime.launches).toEqual([]);
    expect(arraySink.messagesFor('static-check')).toContain(
      'Stage failed, continuing: Command "npm run lint" exited with code 1',
    );
    expect(notifier.notifications).toEqual([
      {
        runID: run.id,
        buildID: 'b42',
        status: 'failure',
        trigger: { type: 'manual' },
        endpoint: undefined,
        failedStage: 'build-artifact',
        reason: 'Command "docker build -t stock-api:b42 ." exited with code 1',
      },
    ]);
  });

  test('strict mode makes best-effort stages blocking', async () => {
    const runner = new TestCommandRunner().respond('npm run lint', {
      exitCode: 2,
    });
    const { orchestrator } = createDeploymentPipeline({
      runner,
      strictBestEffort: true,
    });

    const run = await orchestrator.run({ type: 'manual' });

    expect(run.status).toBe('failure');
    expect(run.failedStage).toBe('static-check');
    expect(run.stages.every((s) => s.policy === 'blocking')).toBe(true);
    expect(runner.commandLines()).toEqual([
      'git pull origin main',
      'npm run lint',
    ]);
  });

  test('an unhealthy new instance fails the last stage', async () => {
    const { orchestrator } = createDeploymentPipeline({ replies: [503] });

    const run = await orchestrator.run({ type: 'manual' }, { buildID: 'b42' });

    expect(run.status).toBe('failure');
    expect(run.failedStage).toBe('health-check-new-instance');
    expect(run.stages[6].error).toBe(
      'http://localhost:8001/health unhealthy after 3 attempt(s)',
    );
  });

  test('a failing notifier does not change the outcome', async () => {
    const { orchestrator, arraySink } = createDeploymentPipeline({
      notifier: {
        name: 'broken',
        notify: () => Promise.reject(new Error('smtp down')),
      },
    });

    const run = await orchestrator.run({ type: 'manual' });

    expect(run.status).toBe('success');
    expect(
      arraySink.logs.some(
        (log) =>
          log.type === 'error' &&
          log.message.startsWith('Notifier broken failed:'),
      ),
    ).toBe(true);
  });

  test('the finished run is frozen', async () => {
    const { orchestrator } = createDeploymentPipeline();

    const run = await orchestrator.run({ type: 'manual' });

    expect(Object.isFrozen(run)).toBe(true);
    expect(Object.isFrozen(run.stages)).toBe(true);
    expect(Object.isFrozen(run.stages[0])).toBe(true);
    expect(Object.isFrozen(run.trigger)).toBe(true);
  });

  test('defaults the build id to the lowercased run id', async () => {
    const { orchestrator } = createDeploymentPipeline();

    const run = await orchestrator.run({ type: 'manual' });

    expect(run.buildID).toBe(run.id.toLowerCase());
  });

  test('exposes webhook trigger details to command templates', async () => {
    const runner = new TestCommandRunner();
    const { logger } = Logger.createTestOptimizedLogger();
    const stage: StageDefinition = {
      name: 'checkout',
      policy: 'blocking',
      run: async (context) => {
        await runner.run({
          command: 'git',
          args: ['checkout', context.locals.commit, context.locals.ref],
        });
      },
    };
    const orchestrator = new PipelineOrchestrator(logger, {
      stages: [stage],
      notifier: createRecordingNotifier(),
    });

    const run = await orchestrator.run({
      type: 'webhook',
      ref: 'refs/heads/main',
      commit: '9fceb02',
    });

    expect(run.trigger).toEqual({
      type: 'webhook',
      ref: 'refs/heads/main',
      commit: '9fceb02',
    });
    expect(runner.commandLines()).toEqual([
      'git checkout 9fceb02 refs/heads/main',
    ]);
  });

  test('a manual run without a commit checks out the tip of the deployed branch', async () => {
    const runner = new TestCommandRunner();
    const { logger } = Logger.createTestOptimizedLogger();
    const stage: StageDefinition = {
      name: 'checkout',
      policy: 'blocking',
      run: async (context) => {
        await runner.run({
          command: 'git',
          args: ['checkout', '--force', context.locals.commit],
        });
      },
    };
    const orchestrator = new PipelineOrchestrator(logger, {
      stages: [stage],
      notifier: createRecordingNotifier(),
      branch: 'main',
    });

    const run = await orchestrator.run({ type: 'manual' });

    expect(run.status).toBe('success');
    expect(runner.commandLines()).toEqual(['git checkout --force origin/main']);
  });

  test('falls back to HEAD when neither a commit nor a branch is known', async () => {
    const runner = new TestCommandRunner();
    const { logger } = Logger.createTestOptimizedLogger();
    const orchestrator = new PipelineOrchestrator(logger, {
      stages: [
        {
          name: 'checkout',
          policy: 'blocking',
          run: async (context) => {
            await runner.run({
              command: 'git',
              args: ['checkout', '--force', context.locals.commit],
            });
          },
        },
      ],
      notifier: createRecordingNotifier(),
    });

    await orchestrator.run({ type: 'manual' });

    expect(runner.commandLines()).toEqual(['git checkout --force HEAD']);
  });

  test('stages after a blocking failure are never executed', async () => {
    const { logger } = Logger.createTestOptimizedLogger();
    const later = vi.fn(() => Promise.resolve());
    const orchestrator = new PipelineOrchestrator(logger, {
      stages: [
        {
          name: 'build-artifact',
          policy: 'blocking',
          run: () => Promise.reject(new Error('compiler crashed')),
        },
        { name: 'deploy-new-instance', policy: 'blocking', run: later },
      ],
      notifier: createRecordingNotifier(),
    });
    const finished: string[] = [];
    orchestrator.on('stage-finished', ({ stage }) => {
      finished.push(`${stage.name}:${stage.outcome}`);
    });

    const run = await orchestrator.run({ type: 'manual' });

    expect(later).not.toHaveBeenCalled();
    expect(run.stages[0].error).toBe('compiler crashed');
    expect(finished).toEqual(['build-artifact:failure']);
  });

  test('log references point at the run id without a log directory', async () => {
    const { orchestrator } = createDeploymentPipeline();

    const run = await orchestrator.run({ type: 'manual' });

    expect(run.logFile).toBeUndefined();
    expect(run.stages[0].logReference).toBe(`${run.id}#checkout`);
  });

  test('writes a per-run log file when a directory is configured', async () => {
    const dir = await fsPromises.mkdtemp(
      path.join(os.tmpdir(), 'service-rollout-runs-'),
    );
    tmpDirs.push(dir);
    const { orchestrator } = createDeploymentPipeline({
      runLogDirectory: dir,
    });

    const run = await orchestrator.run({ type: 'manual' });
    const logFile = path.join(dir, `${run.id}.log`);

    expect(run.logFile).toBe(logFile);
    expect(run.stages[1].logReference).toBe(`${logFile}#static-check`);

    const contents = await fsPromises.readFile(logFile, 'utf8');

    expect(contents).toContain('[INFO] [pipeline] [checkout] Stage started');
    expect(contents).toContain('[SUCCESS] [pipeline] Run');
  });
});
