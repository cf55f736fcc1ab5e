import { ConfigLoadError, ConfigValidationError, loadConfigFile } from '../config';
import type { ConfigEnvironment, LoggingConfig } from '../config';
import { ConsoleSink, logLevelFromName } from '../logger';
import type { Logger } from '../logger';
import {
  listenHTTP,
  pipelineCommand,
  restartCommand,
  serveCommand,
  startCommand,
  statusCommand,
  stopCommand,
  waitForTerminationSignal,
} from './commands';
import type { CommandEnvironment, ListenFunction } from './commands';
import { ExitCode } from './exit-codes';
import { USAGE, UsageError, parseCLIArgs } from './parse-cli-args';
import type { CommandName } from './parse-cli-args';
import { createRolloutContext } from './rollout-context';
import type { RolloutOverrides } from './rollout-context';

export interface CLIDependencies {
  logger: Logger;

  /** Replaced by one built from the `logging` section once config is loaded */
  consoleSink?: ConsoleSink;
  env?: ConfigEnvironment;
  overrides?: RolloutOverrides;
  listen?: ListenFunction;
  waitForShutdown?: () => Promise<void>;
  tableWidth?: number;
}

const HANDLERS: Record<
  CommandName,
  (env: CommandEnvironment) => Promise<ExitCode>
> = {
  start: startCommand,
  stop: stopCommand,
  restart: restartCommand,
  status: statusCommand,
  pipeline: pipelineCommand,
  serve: serveCommand,
};

function applyLoggingConfig(
  logger: Logger,
  consoleSink: ConsoleSink | undefined,
  logging: LoggingConfig,
): void {
  if (!consoleSink) {
    return;
  }

  logger.removeSink(consoleSink);
  logger.addSink(
    new ConsoleSink({
      colors: logging.colors,
      timestamps: logging.timestamps,
      minLevel: logLevelFromName(logging.level),
    }),
  );
}

/**
 * Runs one CLI invocation and resolves with its exit code
 */
export async function runCLI(
  args: string[],
  deps: CLIDependencies,
): Promise<ExitCode> {
  const { logger: rootLogger } = deps;
  const logger = rootLogger.service('cli');

  let parsed: ReturnType<typeof parseCLIArgs>;

  try {
    parsed = parseCLIArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      rootLogger.raw(USAGE);
      return ExitCode.Usage;
    }

    throw error;
  }

  if (parsed.kind === 'help') {
    rootLogger.raw(USAGE);
    return ExitCode.Success;
  }

  const { options } = parsed;

  try {
    const { config, filePath } = await loadConfigFile(
      options.configPath,
      deps.env ?? process.env,
    );

    applyLoggingConfig(rootLogger, deps.consoleSink, config.logging);

    logger.debug('Loaded {{filePath}}: {{config}}', {
      params: { filePath, config },
      redactedKeys: ['config.webhook.secret'],
    });

    const context = createRolloutContext(config, rootLogger, deps.overrides);

    return await HANDLERS[options.command]({
      context,
      options,
      rootLogger,
      logger,
      listen: deps.listen ?? listenHTTP,
      waitForShutdown: deps.waitForShutdown ?? waitForTerminationSignal,
      tableWidth: deps.tableWidth ?? process.stdout.columns ?? 80,
    });
  } catch (error) {
    if (
      error instanceof ConfigValidationError ||
      error instanceof ConfigLoadError
    ) {
      logger.error(error.message);
      return ExitCode.Usage;
    }

    logger.errorObject(`${options.command} failed`, error);
    return ExitCode.Fatal;
  }
}
