import type { StagePolicy } from './types';

/**
 * A stage failed. Recorded on the run, never thrown out of `run()`.
 */
export class StageFailureError extends Error {
  public errPrefix = 'PipelineErr';
  public errType = 'Stage';
  public errCode: 'BlockingStageFailed' | 'BestEffortStageFailed';
  public additionalInfo: { stage: string; policy: StagePolicy };
  public cause?: unknown;

  constructor(stage: string, policy: StagePolicy, cause: unknown) {
    const causeMessage =
      cause instanceof Error ? cause.message : String(cause);
    super(`Stage ${stage} failed: ${causeMessage}`);
    this.name = 'StageFailureError';
    this.errCode =
      policy === 'blocking' ? 'BlockingStageFailed' : 'BestEffortStageFailed';
    this.additionalInfo = { stage, policy };
    this.cause = cause;
  }
}

/**
 * A deploy or stop through a Deployer did not succeed
 */
export class DeployFailedError extends Error {
  public errPrefix = 'PipelineErr';
  public errType = 'Deploy';
  public errCode = 'DeployFailed';
  public additionalInfo: { transport: string; target: string };
  public cause?: unknown;

  constructor(
    message: string,
    additionalInfo: { transport: string; target: string },
    cause?: unknown,
  ) {
    super(message);
    this.name = 'DeployFailedError';
    this.additionalInfo = additionalInfo;
    this.cause = cause;
  }
}

/**
 * A notifier could not deliver. Logged only.
 */
export class NotificationFailedError extends Error {
  public errPrefix = 'PipelineErr';
  public errType = 'Notify';
  public errCode = 'NotificationFailed';
  public additionalInfo: { notifier: string; statusCode?: number };
  public cause?: unknown;

  constructor(
    message: string,
    additionalInfo: { notifier: string; statusCode?: number },
    cause?: unknown,
  ) {
    super(message);
    this.name = 'NotificationFailedError';
    this.additionalInfo = additionalInfo;
    this.cause = cause;
  }
}

/**
 * Error thrown when a stage needs something an earlier stage should have
 * produced
 */
export class MissingStageInputError extends Error {
  public errPrefix = 'PipelineErr';
  public errType = 'Stage';
  public errCode = 'MissingInput';
  public additionalInfo: { stage: string; input: string };

  constructor(additionalInfo: { stage: string; input: string }) {
    super(
      `Stage ${additionalInfo.stage} needs ${additionalInfo.input} from an earlier stage`,
    );
    this.name = 'MissingStageInputError';
    this.additionalInfo = additionalInfo;
  }
}
