export * from './types';
export * from './errors';
export {
  createEscalationLadder,
  validateEscalationLadder,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_FORCED_WAIT_MS,
} from './escalation';
export { LifecycleController } from './lifecycle-controller';
export * from './runtimes';
