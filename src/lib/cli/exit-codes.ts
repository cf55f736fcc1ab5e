import type { StartFailureCode } from '../lifecycle-controller';

export const ExitCode = {
  Success: 0,
  Fatal: 1,
  Usage: 2,
  StartUnconfirmed: 3,
  AlreadyRunning: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForStart(code: StartFailureCode | undefined): ExitCode {
  switch (code) {
    case undefined:
      return ExitCode.Success;
    case 'already_running':
      return ExitCode.AlreadyRunning;
    case 'start_unconfirmed':
      return ExitCode.StartUnconfirmed;
    case 'stop_failed':
    case 'launch_failed':
    case 'probe_failed':
      return ExitCode.Fatal;
  }
}
