import { parseArgs } from 'util';

export const COMMANDS = [
  'start',
  'stop',
  'restart',
  'status',
  'pipeline',
  'serve',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export const USAGE = `
service-rollout - start, stop and deploy one backend service

Usage:
  service-rollout start [--replace] [--no-verify]   Start the service and wait for health
  service-rollout stop                              Stop the service (graceful, then forced)
  service-rollout restart [--no-verify]             Stop, then start
  service-rollout status                            Show what holds the binding
  service-rollout pipeline [--ref <ref>] [--commit <sha>]
                                                    Run the deployment pipeline once
  service-rollout serve                             Listen for push webhooks

Options:
  --config, -c <file>  Configuration file (default: service-rollout.config.json)
  --replace            Stop whatever holds the binding before starting
  --no-verify          Do not wait for the health endpoint after starting
  --ref <ref>          Git ref recorded on a manual pipeline run
  --commit <sha>       Commit recorded on a manual pipeline run
  --help, -h           Show this help

Environment:
  SERVICE_ROLLOUT_LOG_LEVEL       error | warn | notice | info | debug
  SERVICE_ROLLOUT_WEBHOOK_SECRET  Secret for X-Hub-Signature-256 checks
`.trim();

export interface CLIOptions {
  command: CommandName;
  configPath?: string;
  replace: boolean;
  verify: boolean;
  ref?: string;
  commit?: string;
}

export type ParsedCLIArgs =
  | { kind: 'help' }
  | { kind: 'command'; options: CLIOptions };

/**
 * Error thrown for arguments the CLI cannot make sense of
 */
export class UsageError extends Error {
  public errPrefix = 'CLIErr';
  public errType = 'Usage';
  public errCode = 'InvalidArguments';
  public additionalInfo: { args: string[] };

  constructor(message: string, args: string[]) {
    super(message);
    this.name = 'UsageError';
    this.additionalInfo = { args };
  }
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export function parseCLIArgs(args: string[]): ParsedCLIArgs {
  let parsed: ReturnType<typeof parseFlags>;

  try {
    parsed = parseFlags(args);
  } catch (error) {
    throw new UsageError(
      error instanceof Error ? error.message : String(error),
      args,
    );
  }

  const { values, positionals } = parsed;

  if (values.help === true || positionals.length === 0) {
    return { kind: 'help' };
  }

  if (positionals.length > 1) {
    throw new UsageError(
      `Expected one command, got: ${positionals.join(' ')}`,
      args,
    );
  }

  const [command] = positionals;

  if (!isCommandName(command)) {
    throw new UsageError(`Unknown command: ${command}`, args);
  }

  return {
    kind: 'command',
    options: {
      command,
      configPath: values.config,
      replace: values.replace === true,
      verify: values['no-verify'] !== true,
      ref: values.ref,
      commit: values.commit,
    },
  };
}

function parseFlags(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: 'string', short: 'c' },
      replace: { type: 'boolean' },
      'no-verify': { type: 'boolean' },
      ref: { type: 'string' },
      commit: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
