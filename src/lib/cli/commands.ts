import type { Server } from 'http';
import type { Express } from 'express';
import type { Logger, LoggerService } from '../logger';
import type { StartResult } from '../lifecycle-controller';
import { renderRunSummary } from '../pipeline';
import { describeBinding } from '../probe';
import { WebhookReceiver, createWebhookApp } from '../webhook';
import { ExitCode, exitCodeForStart } from './exit-codes';
import type { CLIOptions } from './parse-cli-args';
import type { RolloutContext } from './rollout-context';

export interface ListeningServer {
  close(): Promise<void>;
}

export type ListenFunction = (
  app: Express,
  port: number,
  host: string,
) => Promise<ListeningServer>;

export interface CommandEnvironment {
  context: RolloutContext;
  options: CLIOptions;
  rootLogger: Logger;
  logger: LoggerService;
  listen: ListenFunction;
  waitForShutdown: () => Promise<void>;
  tableWidth: number;
}

export const listenHTTP: ListenFunction = (app, port, host) =>
  new Promise((resolve, reject) => {
    const server: Server = app.listen(port, host);

    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      resolve({
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) =>
              error ? rejectClose(error) : resolveClose(),
            );
          }),
      });
    });
  });

/**
 * Resolves on the first SIGINT or SIGTERM
 */
export function waitForTerminationSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve();
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

function reportStart(env: CommandEnvironment, result: StartResult): ExitCode {
  const { context, logger } = env;
  const logFile = context.controller.logFile;

  if (!result.success) {
    logger.error('Start failed ({{code}}): {{reason}}', {
      params: { code: result.code, reason: result.reason },
    });

    if (result.code === 'start_unconfirmed' && logFile) {
      logger.notice('Its output goes to {{logFile}}', { params: { logFile } });
    }

    return exitCodeForStart(result.code);
  }

  if (result.instance?.status === 'starting') {
    logger.notice('Launched {{id}} without waiting for {{healthURL}}', {
      params: {
        id: result.instance.id,
        healthURL: context.controller.healthURL,
      },
    });
  }

  logger.success('Service is up at {{endpoint}}', {
    params: { endpoint: context.target.endpoint },
  });

  if (logFile) {
    logger.info('Logs: {{logFile}}', { params: { logFile } });
  }

  logger.info('Stop with: service-rollout stop');

  return ExitCode.Success;
}

export async function startCommand(env: CommandEnvironment): Promise<ExitCode> {
  const result = await env.context.controller.start({
    replace: env.options.replace,
    verifyHealth: env.options.verify,
  });

  return reportStart(env, result);
}

export async function stopCommand(env: CommandEnvironment): Promise<ExitCode> {
  const result = await env.context.controller.stop();

  if (!result.success) {
    env.logger.error('Stop failed ({{code}}): {{reason}}', {
      params: { code: result.code, reason: result.reason },
    });
    return ExitCode.Fatal;
  }

  return ExitCode.Success;
}

export async function restartCommand(
  env: CommandEnvironment,
): Promise<ExitCode> {
  const result = await env.context.controller.restart({
    verifyHealth: env.options.verify,
  });

  if (!result.start) {
    env.logger.error('Restart aborted, the old instance is still running: {{reason}}', {
      params: { reason: result.reason },
    });
    return ExitCode.Fatal;
  }

  return reportStart(env, result.start);
}

export async function statusCommand(
  env: CommandEnvironment,
): Promise<ExitCode> {
  const status = await env.context.controller.status();
  const binding = describeBinding(status.binding);

  env.rootLogger.raw(
    status.instanceIDs.length === 0
      ? `${binding}: ${status.status}`
      : `${binding}: ${status.status} (${status.instanceIDs.join(', ')})`,
  );

  return ExitCode.Success;
}

export async function pipelineCommand(
  env: CommandEnvironment,
): Promise<ExitCode> {
  const run = await env.context.orchestrator.run({
    type: 'manual',
    ref: env.options.ref,
    commit: env.options.commit,
  });

  env.rootLogger.raw(renderRunSummary(run, { tableWidth: env.tableWidth }));

  if (run.logFile) {
    env.logger.info('Run log: {{logFile}}', {
      params: { logFile: run.logFile },
    });
  }

  return run.status === 'success' ? ExitCode.Success : ExitCode.Fatal;
}

/**
 * Listen for push webhooks until a termination signal, then let the active
 * run finish
 */
export async function serveCommand(env: CommandEnvironment): Promise<ExitCode> {
  const { context, logger } = env;
  const { pipeline, webhook } = context.config;

  if (webhook.secret === undefined) {
    logger.warn('No webhook secret configured; deliveries are not verified');
  }

  const receiver = new WebhookReceiver(env.rootLogger, {
    deployBranch: pipeline.deployBranch,
    secret: webhook.secret,
    onTrigger: (trigger) => context.orchestrator.run(trigger),
  });

  const app = createWebhookApp(receiver, {
    path: webhook.path,
    bodyLimit: webhook.bodyLimit,
  });

  const server = await env.listen(app, webhook.port, webhook.host);

  logger.notice('Listening on http://{{host}}:{{port}}{{path}} for pushes to {{branch}}', {
    params: {
      host: webhook.host,
      port: webhook.port,
      path: webhook.path,
      branch: pipeline.deployBranch,
    },
  });

  await env.waitForShutdown();

  logger.notice('Shutting down');
  await server.close();

  if (receiver.busy) {
    logger.info('Waiting for the active run to finish');
    await receiver.waitForIdle();
  }

  return ExitCode.Success;
}
