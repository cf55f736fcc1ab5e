import { CurlyBrackets } from '../curly-brackets';
import type { CommandRunner, CommandSpec } from '../command-runner';
import type { HealthChecker, HealthPollOptions } from '../health-checker';
import { runCommandSteps } from './command-steps';
import { DeployFailedError, MissingStageInputError } from './errors';
import type { DeployTarget, Deployer, StageDefinition } from './types';

export const STAGE_NAMES = [
  'checkout',
  'static-check',
  'test',
  'build-artifact',
  'stop-old-instance',
  'deploy-new-instance',
  'health-check-new-instance',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export interface StageCommands {
  checkout?: CommandSpec[];
  staticCheck?: CommandSpec[];
  test?: CommandSpec[];
  buildArtifact?: CommandSpec[];
}

export interface DeploymentStagesOptions {
  runner: CommandRunner;
  commands: StageCommands;

  /** Artifact reference template, e.g. `stock-api:{{buildID}}` */
  artifactReference: string;
  deployer: Deployer;
  target: DeployTarget;
  healthChecker: HealthChecker;
  health?: HealthPollOptions;
}

/**
 * The fixed deployment stage list: checkout, lint and tests (best-effort),
 * build, then replace the running instance and confirm it is healthy
 */
export function createDeploymentStages(
  options: DeploymentStagesOptions,
): StageDefinition[] {
  const { runner, commands, deployer, target } = options;

  const commandStage = (
    name: StageName,
    policy: StageDefinition['policy'],
    specs: CommandSpec[] | undefined,
  ): StageDefinition => ({
    name,
    policy,
    run: async (context) => {
      if (!specs || specs.length === 0) {
        context.logger.info('No commands configured');
        return { summary: 'nothing to run' };
      }

      await runCommandSteps(runner, specs, context.locals, context.logger);
      return { summary: `${specs.length} command(s)` };
    },
  });

  return [
    commandStage('checkout', 'blocking', commands.checkout),
    commandStage('static-check', 'best-effort', commands.staticCheck),
    commandStage('test', 'best-effort', commands.test),
    {
      name: 'build-artifact',
      policy: 'blocking',
      run: async (context) => {
        if (commands.buildArtifact && commands.buildArtifact.length > 0) {
          await runCommandSteps(
            runner,
            commands.buildArtifact,
            context.locals,
            context.logger,
          );
        }

        const artifact = {
          buildID: context.buildID,
          reference: CurlyBrackets(options.artifactReference, context.locals),
        };

        return { artifact, summary: artifact.reference };
      },
    },
    {
      name: 'stop-old-instance',
      policy: 'blocking',
      run: async () => {
        const result = await deployer.stop(target);

        if (!result.success) {
          throw (
            result.error ??
            new DeployFailedError(result.reason ?? 'stop failed', {
              transport: deployer.transport,
              target: target.name,
            })
          );
        }

        return { summary: `stopped via ${deployer.transport}` };
      },
    },
    {
      name: 'deploy-new-instance',
      policy: 'blocking',
      run: async (context) => {
        const artifact = context.state.artifact;

        if (!artifact) {
          throw new MissingStageInputError({
            stage: 'deploy-new-instance',
            input: 'an artifact',
          });
        }

        const result = await deployer.deploy(target, artifact);

        if (!result.success) {
          throw (
            result.error ??
            new DeployFailedError(result.reason ?? 'deploy failed', {
              transport: deployer.transport,
              target: target.name,
            })
          );
        }

        return {
          instanceID: result.instanceID,
          endpoint: result.endpoint ?? target.endpoint,
          summary: result.instanceID
            ? `instance ${result.instanceID}`
            : `deployed to ${target.name}`,
        };
      },
    },
    {
      name: 'health-check-new-instance',
      policy: 'blocking',
      run: async (context) => {
        const health = await options.healthChecker.poll(
          target.healthURL,
          options.health,
        );

        if (health.outcome !== 'healthy') {
          throw new Error(
            `${target.healthURL} ${health.outcome} after ${health.attempts} attempt(s)`,
          );
        }

        context.logger.info('Healthy after {{attempts}} attempt(s)', {
          params: { attempts: health.attempts },
        });

        return { summary: `healthy in ${health.elapsedMS}ms` };
      },
    },
  ];
}
