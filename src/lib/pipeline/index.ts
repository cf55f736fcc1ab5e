export * from './types';
export * from './errors';
export { PipelineOrchestrator } from './pipeline-orchestrator';
export type {
  PipelineOrchestratorOptions,
  RunOptions,
} from './pipeline-orchestrator';
export { createDeploymentStages, STAGE_NAMES } from './stages';
export type {
  StageName,
  StageCommands,
  DeploymentStagesOptions,
} from './stages';
export { LocalDeployer, CommandDeployer } from './deployers';
export type { CommandDeployerOptions } from './deployers';
export {
  LoggerNotifier,
  WebhookNotifier,
  FanOutNotifier,
} from './notifiers';
export type { WebhookNotifierOptions, NotifyFetchFunction } from './notifiers';
export { renderCommand, runCommandSteps } from './command-steps';
export { renderRunSummary } from './run-summary';
