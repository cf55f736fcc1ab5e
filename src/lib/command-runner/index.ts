export type { CommandSpec, CommandResult, CommandRunner } from './types';
export { CommandSpawnError, CommandFailedError } from './errors';
export { ChildProcessCommandRunner } from './child-process-runner';
