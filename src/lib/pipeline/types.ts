import type { LoggerService } from '../logger';
import type { Artifact } from '../lifecycle-controller';

export type StagePolicy = 'blocking' | 'best-effort';
export type StageOutcome = 'success' | 'failure' | 'skipped';
export type RunStatus = 'running' | 'success' | 'failure';

export type PipelineTrigger =
  | { type: 'manual'; ref?: string; commit?: string }
  | {
      type: 'webhook';
      ref: string;
      commit?: string;
      deliveryID?: string;
    };

export interface StageRecord {
  name: string;

  /** Policy in effect for this run (strict mode turns best-effort blocking) */
  policy: StagePolicy;
  outcome: StageOutcome;

  /** Where this stage's output can be found: `<log file or run id>#<stage>` */
  logReference: string;
  startedAt: number | null;
  finishedAt: number | null;
  durationMS: number | null;
  summary?: string;
  error?: string;
}

export interface PipelineRun {
  id: string;
  trigger: PipelineTrigger;
  status: RunStatus;
  buildID: string;
  stages: StageRecord[];
  failedStage?: string;
  endpoint?: string;
  artifact?: Artifact;
  logFile?: string;
  startedAt: number;
  finishedAt?: number;
}

/**
 * Values shared between stages of one run
 */
export interface PipelineState {
  artifact?: Artifact;
  instanceID?: string;
  endpoint?: string;
}

export interface StageContext {
  runID: string;
  buildID: string;
  trigger: PipelineTrigger;

  /** Template locals for command arguments */
  locals: Record<string, string>;
  state: PipelineState;
  logger: LoggerService;
}

export interface StageOutput {
  summary?: string;
  artifact?: Artifact;
  instanceID?: string;
  endpoint?: string;
}

export interface StageDefinition {
  name: string;
  policy: StagePolicy;

  /** Throw to fail the stage */
  run(context: StageContext): Promise<StageOutput | void>;
}

export interface RunNotification {
  runID: string;
  buildID: string;
  status: 'success' | 'failure';
  trigger: PipelineTrigger;
  endpoint?: string;
  failedStage?: string;
  reason?: string;
}

export interface Notifier {
  readonly name: string;
  notify(notification: RunNotification): Promise<void>;
}

export interface DeployTarget {
  name: string;
  host: string;

  /** Public URL of the deployed service */
  endpoint: string;
  healthURL: string;
  variables?: Record<string, string>;
}

export interface DeployResult {
  success: boolean;
  instanceID?: string;
  endpoint?: string;
  reason?: string;
  error?: Error;
}

export interface Deployer {
  readonly transport: string;

  /** Stop what the previous deploy left running. Idempotent. */
  stop(target: DeployTarget): Promise<DeployResult>;
  deploy(target: DeployTarget, artifact: Artifact): Promise<DeployResult>;
}

export interface PipelineEvents {
  'run-started': { runID: string; trigger: PipelineTrigger };
  'stage-finished': { runID: string; stage: StageRecord };
  'run-finished': { run: Readonly<PipelineRun> };
}
