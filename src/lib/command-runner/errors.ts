/**
 * Error thrown when a command cannot be spawned (missing binary, bad cwd)
 */
export class CommandSpawnError extends Error {
  public errPrefix = 'CommandRunnerErr';
  public errType = 'Command';
  public errCode = 'SpawnFailed';
  public additionalInfo: { command: string; args: string[] };
  public cause?: unknown;

  constructor(additionalInfo: { command: string; args: string[] }, cause?: unknown) {
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to spawn "${additionalInfo.command}"${causeMessage}`);
    this.name = 'CommandSpawnError';
    this.additionalInfo = additionalInfo;
    this.cause = cause;
  }
}

/**
 * Error thrown by callers that require a command to exit with status 0
 */
export class CommandFailedError extends Error {
  public errPrefix = 'CommandRunnerErr';
  public errType = 'Command';
  public errCode = 'NonZeroExit';
  public additionalInfo: {
    command: string;
    args: string[];
    exitCode: number;
    stderr: string;
  };

  constructor(additionalInfo: {
    command: string;
    args: string[];
    exitCode: number;
    stderr: string;
  }) {
    super(
      `Command "${[additionalInfo.command, ...additionalInfo.args].join(' ')}" exited with code ${additionalInfo.exitCode}`,
    );
    this.name = 'CommandFailedError';
    this.additionalInfo = additionalInfo;
  }
}
