import path from 'path';
import { EventEmitterProtected } from '../event-emitter';
import { generateRunID } from '../id-helpers';
import { FileSink } from '../logger';
import type { Logger, LoggerService } from '../logger';
import { StageFailureError } from './errors';
import { LoggerNotifier } from './notifiers';
import type {
  Notifier,
  PipelineEvents,
  PipelineRun,
  PipelineState,
  PipelineTrigger,
  RunNotification,
  StageContext,
  StageDefinition,
  StagePolicy,
  StageRecord,
} from './types';

export interface PipelineOrchestratorOptions {
  stages: StageDefinition[];
  notifier?: Notifier;

  /** Treat best-effort stages as blocking */
  strictBestEffort?: boolean;

  /** When set, each run also logs to `<dir>/<runID>.log` */
  runLogDirectory?: string;

  /** Reported on success unless a stage returns its own endpoint */
  endpoint?: string;

  /** Name of the deployed branch, exposed to command templates */
  branch?: string;
  now?: () => number;
}

export interface RunOptions {
  buildID?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function freezeRun(run: PipelineRun): Readonly<PipelineRun> {
  for (const stage of run.stages) {
    Object.freeze(stage);
  }

  Object.freeze(run.stages);
  Object.freeze(run.trigger);

  if (run.artifact) {
    Object.freeze(run.artifact);
  }

  return Object.freeze(run);
}

/**
 * Runs the stage list in order. A failing blocking stage ends the run and
 * every later stage is recorded as skipped; a failing best-effort stage is
 * logged and the run moves on. Runs are not retried.
 */
export class PipelineOrchestrator extends EventEmitterProtected<PipelineEvents> {
  private stages: StageDefinition[];
  private notifier: Notifier;
  private strictBestEffort: boolean;
  private runLogDirectory?: string;
  private endpoint?: string;
  private branch?: string;
  private now: () => number;
  private rootLogger: Logger;
  private logger: LoggerService;

  constructor(rootLogger: Logger, options: PipelineOrchestratorOptions) {
    super();

    this.rootLogger = rootLogger;
    this.logger = rootLogger.service('pipeline');
    this.stages = options.stages;
    this.notifier = options.notifier ?? new LoggerNotifier(this.logger);
    this.strictBestEffort = options.strictBestEffort ?? false;
    this.runLogDirectory = options.runLogDirectory;
    this.endpoint = options.endpoint;
    this.branch = options.branch;
    this.now = options.now ?? Date.now;
  }

  public get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /** Without a pinned commit, a run deploys the fetched tip of the branch */
  private defaultCommit(): string {
    return this.branch ? `origin/${this.branch}` : 'HEAD';
  }

  public async run(
    trigger: PipelineTrigger,
    options: RunOptions = {},
  ): Promise<Readonly<PipelineRun>> {
    const runID = generateRunID(this.now());
    // docker tags must be lowercase
    const buildID = options.buildID ?? runID.toLowerCase();
    const logFile = this.runLogDirectory
      ? path.join(this.runLogDirectory, `${runID}.log`)
      : undefined;
    const fileSink = logFile ? new FileSink({ filePath: logFile }) : undefined;

    if (fileSink) {
      this.rootLogger.addSink(fileSink);
    }

    const run: PipelineRun = {
      id: runID,
      trigger: { ...trigger },
      status: 'running',
      buildID,
      stages: this.stages.map((stage) => ({
        name: stage.name,
        policy: this.effectivePolicy(stage.policy),
        outcome: 'skipped',
        logReference: `${logFile ?? runID}#${stage.name}`,
        startedAt: null,
        finishedAt: null,
        durationMS: null,
      })),
      logFile,
      startedAt: this.now(),
    };

    const state: PipelineState = {};
    const locals: Record<string, string> = {
      runID,
      buildID,
      branch: this.branch ?? '',
      ref: trigger.ref ?? '',
      commit: trigger.commit ?? this.defaultCommit(),
    };

    this.logger.info('Run {{runID}} started ({{trigger}})', {
      params: { runID, trigger: trigger.type },
    });
    this.emit('run-started', { runID, trigger: run.trigger });

    try {
      for (const [index, stage] of this.stages.entries()) {
        const record = run.stages[index];
        const passed = await this.runStage(stage, record, {
          runID,
          buildID,
          trigger: run.trigger,
          locals,
          state,
          logger: this.logger.entity(stage.name),
        });

        this.emit('stage-finished', { runID, stage: { ...record } });

        if (!passed) {
          run.status = 'failure';
          run.failedStage = stage.name;
          break;
        }
      }

      if (run.status === 'running') {
        run.status = 'success';
        run.endpoint = state.endpoint ?? this.endpoint;
      }

      run.artifact = state.artifact;
      run.finishedAt = this.now();

      const failedRecord = run.stages.find(
        (stage) => stage.name === run.failedStage,
      );

      if (run.status === 'success') {
        this.logger.success('Run {{runID}} succeeded', { params: { runID } });
      } else {
        this.logger.error('Run {{runID}} failed at {{stage}}', {
          params: { runID, stage: run.failedStage },
        });
      }

      await this.notify({
        runID,
        buildID,
        status: run.status === 'success' ? 'success' : 'failure',
        trigger: run.trigger,
        endpoint: run.endpoint,
        failedStage: run.failedStage,
        reason: failedRecord?.error,
      });
    } finally {
      if (fileSink) {
        this.rootLogger.removeSink(fileSink);
        await fileSink.close();
      }
    }

    const finished = freezeRun(run);
    this.emit('run-finished', { run: finished });

    return finished;
  }

  /**
   * Returns false when the run must stop here
   */
  private async runStage(
    stage: StageDefinition,
    record: StageRecord,
    context: StageContext,
  ): Promise<boolean> {
    const startedAt = this.now();
    record.startedAt = startedAt;
    context.logger.info('Stage started');

    try {
      const output = await stage.run(context);

      if (output) {
        if (output.artifact) {
          context.state.artifact = output.artifact;
        }

        if (output.instanceID) {
          context.state.instanceID = output.instanceID;
        }

        if (output.endpoint) {
          context.state.endpoint = output.endpoint;
        }

        record.summary = output.summary;
      }

      record.outcome = 'success';
      context.logger.info('Stage succeeded');

      return true;
    } catch (error) {
      const failure = new StageFailureError(stage.name, record.policy, error);

      record.outcome = 'failure';
      record.error = errorMessage(error);

      if (record.policy === 'best-effort') {
        context.logger.warn('Stage failed, continuing: {{reason}}', {
          params: { reason: record.error },
        });

        return true;
      }

      context.logger.errorObject('Blocking stage failed', failure);

      return false;
    } finally {
      const finishedAt = this.now();
      record.finishedAt = finishedAt;
      record.durationMS = finishedAt - startedAt;
    }
  }

  private async notify(notification: RunNotification): Promise<void> {
    try {
      await this.notifier.notify(notification);
    } catch (error) {
      this.logger.errorObject(`Notifier ${this.notifier.name} failed`, error);
    }
  }

  private effectivePolicy(policy: StagePolicy): StagePolicy {
    return this.strictBestEffort ? 'blocking' : policy;
  }
}
