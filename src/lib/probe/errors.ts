import type { Binding } from './types';
import { describeBinding } from './types';

/**
 * Error thrown when the probe tool itself could not answer (not installed,
 * unexpected exit status). An absent instance is never an error.
 */
export class ProbeFailedError extends Error {
  public errPrefix = 'ProbeErr';
  public errType = 'Probe';
  public errCode = 'ProbeFailed';
  public additionalInfo: {
    binding: string;
    command: string;
    exitCode?: number;
    stderr?: string;
  };
  public cause?: unknown;

  constructor(
    binding: Binding,
    details: { command: string; exitCode?: number; stderr?: string },
    cause?: unknown,
  ) {
    super(`Could not probe ${describeBinding(binding)} with ${details.command}`);
    this.name = 'ProbeFailedError';
    this.additionalInfo = { binding: describeBinding(binding), ...details };
    this.cause = cause;
  }
}
