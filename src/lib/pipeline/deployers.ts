import type { CommandRunner, CommandSpec } from '../command-runner';
import type { Artifact, LifecycleController } from '../lifecycle-controller';
import type { LoggerService } from '../logger';
import { runCommandSteps } from './command-steps';
import { DeployFailedError } from './errors';
import type { DeployResult, DeployTarget, Deployer } from './types';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Deploys on this host through the lifecycle controller. Health is left to
 * the pipeline's own health-check stage.
 */
export class LocalDeployer implements Deployer {
  public readonly transport = 'local';
  private controller: LifecycleController;

  constructor(controller: LifecycleController) {
    this.controller = controller;
  }

  public async stop(_target: DeployTarget): Promise<DeployResult> {
    const result = await this.controller.stop();

    if (!result.success) {
      return { success: false, reason: result.reason, error: result.error };
    }

    return { success: true };
  }

  public async deploy(
    target: DeployTarget,
    artifact: Artifact,
  ): Promise<DeployResult> {
    const result = await this.controller.start({
      artifact,
      verifyHealth: false,
    });

    if (!result.success) {
      return { success: false, reason: result.reason, error: result.error };
    }

    return {
      success: true,
      instanceID: result.instance?.id,
      endpoint: target.endpoint,
    };
  }
}

export interface CommandDeployerOptions {
  runner: CommandRunner;

  /**
   * Commands that ship and start the artifact, e.g. a registry push then
   * `ssh <host> docker run ...`. Templates over `artifact`, `buildID` and
   * `target` (`{{target.host}}`, `{{target.variables.key}}`).
   */
  deployCommands: CommandSpec[];

  /** May be empty when the deploy commands replace the old instance themselves */
  stopCommands?: CommandSpec[];
  logger: LoggerService;
}

/**
 * Deploys by running templated commands, typically against a remote host
 */
export class CommandDeployer implements Deployer {
  public readonly transport = 'command';
  private runner: CommandRunner;
  private deployCommands: CommandSpec[];
  private stopCommands: CommandSpec[];
  private logger: LoggerService;

  constructor(options: CommandDeployerOptions) {
    this.runner = options.runner;
    this.deployCommands = options.deployCommands;
    this.stopCommands = options.stopCommands ?? [];
    this.logger = options.logger;
  }

  public async stop(target: DeployTarget): Promise<DeployResult> {
    if (this.stopCommands.length === 0) {
      this.logger.info('No stop commands for {{target}}', {
        params: { target: target.name },
      });
      return { success: true };
    }

    return this.runAll(this.stopCommands, { target }, target, 'Stop');
  }

  public async deploy(
    target: DeployTarget,
    artifact: Artifact,
  ): Promise<DeployResult> {
    const result = await this.runAll(
      this.deployCommands,
      { target, artifact: artifact.reference, buildID: artifact.buildID },
      target,
      'Deploy',
    );

    return result.success ? { ...result, endpoint: target.endpoint } : result;
  }

  private async runAll(
    commands: CommandSpec[],
    locals: Record<string, unknown>,
    target: DeployTarget,
    action: 'Stop' | 'Deploy',
  ): Promise<DeployResult> {
    try {
      await runCommandSteps(this.runner, commands, locals, this.logger);
      return { success: true };
    } catch (error) {
      const deployError = new DeployFailedError(
        `${action} on ${target.name} failed: ${toError(error).message}`,
        { transport: this.transport, target: target.name },
        error,
      );

      return {
        success: false,
        reason: deployError.message,
        error: deployError,
      };
    }
  }
}
