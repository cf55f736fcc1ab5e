export interface CommandSpec {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;

  /** Kill the command (SIGTERM) after this many milliseconds */
  timeoutMS?: number;
}

export interface CommandResult {
  /** Process exit status, or -1 when the process was ended by a signal */
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs external commands to completion. Non-zero exits resolve normally;
 * only a command that cannot be spawned at all rejects.
 */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}
