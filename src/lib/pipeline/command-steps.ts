import { CurlyBrackets } from '../curly-brackets';
import { CommandFailedError } from '../command-runner';
import type { CommandResult, CommandRunner, CommandSpec } from '../command-runner';
import type { LoggerService } from '../logger';

/** Lines of stderr kept on a failure */
const STDERR_TAIL_LINES = 20;

function tail(output: string, lines: number): string {
  return output.trimEnd().split('\n').slice(-lines).join('\n');
}

/**
 * Fill `{{placeholders}}` in the command, its arguments, cwd and env values
 */
export function renderCommand(
  spec: CommandSpec,
  locals: Record<string, unknown>,
): CommandSpec {
  const render = (value: string): string => CurlyBrackets(value, locals);

  return {
    ...spec,
    command: render(spec.command),
    args: spec.args?.map(render),
    cwd: spec.cwd === undefined ? undefined : render(spec.cwd),
    env:
      spec.env === undefined
        ? undefined
        : Object.fromEntries(
            Object.entries(spec.env).map(([key, value]) => [key, render(value)]),
          ),
  };
}

/**
 * Run commands in order, stopping at the first non-zero exit (thrown as
 * CommandFailedError). Output goes to the logger at debug level.
 */
export async function runCommandSteps(
  runner: CommandRunner,
  specs: readonly CommandSpec[],
  locals: Record<string, unknown>,
  logger: LoggerService,
): Promise<CommandResult[]> {
  const results: CommandResult[] = [];

  for (const template of specs) {
    const spec = renderCommand(template, locals);
    const args = spec.args ?? [];
    const line = [spec.command, ...args].join(' ');

    logger.info('$ {{line}}', { params: { line } });

    const result = await runner.run(spec);
    results.push(result);

    if (result.stdout.trim() !== '') {
      logger.debug(result.stdout.trimEnd());
    }

    if (result.exitCode !== 0) {
      const stderr = tail(result.stderr, STDERR_TAIL_LINES);

      if (stderr !== '') {
        logger.error(stderr);
      }

      throw new CommandFailedError({
        command: spec.command,
        args,
        exitCode: result.exitCode,
        stderr,
      });
    }
  }

  return results;
}
