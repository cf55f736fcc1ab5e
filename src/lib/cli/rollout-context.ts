import { ChildProcessCommandRunner } from '../command-runner';
import type { CommandRunner } from '../command-runner';
import { serviceEndpoint, serviceHealthURL } from '../config';
import type { ServiceConfig, ServiceRolloutConfig } from '../config';
import { HealthChecker } from '../health-checker';
import type { HealthFetchFunction } from '../health-checker';
import {
  ContainerRuntime,
  LifecycleController,
  ProcessRuntime,
  createEscalationLadder,
} from '../lifecycle-controller';
import type { ServiceRuntime } from '../lifecycle-controller';
import type { Logger } from '../logger';
import {
  CommandDeployer,
  FanOutNotifier,
  LocalDeployer,
  LoggerNotifier,
  PipelineOrchestrator,
  WebhookNotifier,
  createDeploymentStages,
} from '../pipeline';
import type {
  DeployTarget,
  Deployer,
  Notifier,
  NotifyFetchFunction,
} from '../pipeline';
import { SystemProbe } from '../probe';
import type { Probe } from '../probe';
import type { SleepFunction } from '../sleep';

/**
 * Replaceable collaborators, so the CLI can run without touching the host
 */
export interface RolloutOverrides {
  runner?: CommandRunner;
  probe?: Probe;
  runtime?: ServiceRuntime;
  healthFetch?: HealthFetchFunction;
  notifyFetch?: NotifyFetchFunction;
  sleep?: SleepFunction;
  notifier?: Notifier;
}

export interface RolloutContext {
  config: ServiceRolloutConfig;
  runner: CommandRunner;
  runtime: ServiceRuntime;
  healthChecker: HealthChecker;
  controller: LifecycleController;
  target: DeployTarget;
  deployer: Deployer;
  orchestrator: PipelineOrchestrator;
}

function createRuntime(
  service: ServiceConfig,
  runner: CommandRunner,
  probe: Probe,
): ServiceRuntime {
  const { runtime } = service;

  if (runtime.type === 'process') {
    return new ProcessRuntime({
      command: runtime.command,
      cwd: runtime.cwd,
      env: runtime.env,
      logFile: runtime.logFile,
      probe,
    });
  }

  return new ContainerRuntime({
    image: runtime.image,
    runArgs: runtime.runArgs,
    stopTimeoutSeconds: runtime.stopTimeoutSeconds,
    runner,
    probe,
  });
}

function createTarget(config: ServiceRolloutConfig): DeployTarget {
  const { service, pipeline } = config;

  if (pipeline.deploy.transport === 'command') {
    const { name, host, endpoint, healthURL, variables } = pipeline.deploy;
    return { name, host, endpoint, healthURL, variables };
  }

  return {
    name: service.name,
    host: service.host,
    endpoint: pipeline.publicEndpoint ?? serviceEndpoint(service),
    healthURL: serviceHealthURL(service),
  };
}

/**
 * Builds every collaborator a command needs from one configuration
 */
export function createRolloutContext(
  config: ServiceRolloutConfig,
  logger: Logger,
  overrides: RolloutOverrides = {},
): RolloutContext {
  const { service, pipeline } = config;
  const runner = overrides.runner ?? new ChildProcessCommandRunner();
  const probe = overrides.probe ?? new SystemProbe(runner);
  const runtime = overrides.runtime ?? createRuntime(service, runner, probe);

  const healthChecker = new HealthChecker({
    fetch: overrides.healthFetch,
    sleep: overrides.sleep,
    defaults: {
      maxAttempts: service.maxAttempts,
      intervalMS: service.intervalMS,
      requestTimeoutMS: service.requestTimeoutMS,
    },
  });

  const controller = new LifecycleController(logger, {
    binding: service.binding,
    runtime,
    healthURL: serviceHealthURL(service),
    escalation:
      service.escalation ??
      createEscalationLadder(service.gracePeriodMS, service.forcedWaitMS),
    healthChecker,
    sleep: overrides.sleep,
  });

  const target = createTarget(config);
  const pipelineLogger = logger.service('pipeline');

  const deployer: Deployer =
    pipeline.deploy.transport === 'command'
      ? new CommandDeployer({
          runner,
          deployCommands: pipeline.deploy.deployCommands,
          stopCommands: pipeline.deploy.stopCommands,
          logger: pipelineLogger.entity('deploy'),
        })
      : new LocalDeployer(controller);

  let notifier = overrides.notifier;

  if (!notifier) {
    const loggerNotifier = new LoggerNotifier(pipelineLogger);
    const { webhookURL, timeoutMS } = pipeline.notify;

    notifier = webhookURL
      ? new FanOutNotifier(
          [
            loggerNotifier,
            new WebhookNotifier({
              url: webhookURL,
              timeoutMS,
              fetch: overrides.notifyFetch,
            }),
          ],
          pipelineLogger.entity('notify'),
        )
      : loggerNotifier;
  }

  const orchestrator = new PipelineOrchestrator(logger, {
    stages: createDeploymentStages({
      runner,
      commands: pipeline.commands,
      artifactReference: pipeline.artifactReference,
      deployer,
      target,
      healthChecker,
    }),
    notifier,
    strictBestEffort: pipeline.strictBestEffort,
    runLogDirectory: pipeline.runLogDirectory,
    endpoint: target.endpoint,
    branch: pipeline.deployBranch,
  });

  return {
    config,
    runner,
    runtime,
    healthChecker,
    controller,
    target,
    deployer,
    orchestrator,
  };
}
