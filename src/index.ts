// module entry point

// Service lifecycle
export * from './lib/lifecycle-controller';
export * from './lib/probe';
export * from './lib/health-checker';
export * from './lib/command-runner';

// Deployment pipeline
export * from './lib/pipeline';
export * from './lib/webhook';

// Configuration
export * from './lib/config';

// Logging
export { Logger } from './lib/logger';
export * from './lib/logger/types';
export * from './lib/logger/sinks';
export { LoggerService } from './lib/logger/logger-service';

// CLI
export {
  runCLI,
  createRolloutContext,
  ExitCode,
  type CLIDependencies,
  type RolloutContext,
  type RolloutOverrides,
} from './lib/cli';

// Utilities
export { EventEmitter, EventEmitterProtected } from './lib/event-emitter';
export { RetryPolicy } from './lib/retry-utils';
export { generateRunID, isRunID } from './lib/id-helpers';
export { CurlyBrackets } from './lib/curly-brackets';
export { MultiColumnASCIITable } from './lib/ascii-tables/multi-column-ascii-table';
