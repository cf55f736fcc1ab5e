export { runCLI } from './run-cli';
export type { CLIDependencies } from './run-cli';
export { parseCLIArgs, UsageError, USAGE, COMMANDS } from './parse-cli-args';
export type { CLIOptions, CommandName, ParsedCLIArgs } from './parse-cli-args';
export { ExitCode, exitCodeForStart } from './exit-codes';
export { createRolloutContext } from './rollout-context';
export type { RolloutContext, RolloutOverrides } from './rollout-context';
export { listenHTTP, waitForTerminationSignal } from './commands';
export type { ListenFunction, ListeningServer } from './commands';
