import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../logger/types';

export const HttpUrlSchema = z.string().refine((value) => {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}, 'Invalid URL (expected http:// or https://)');

const PortSchema = z.number().int().min(1).max(65535);

export const CommandSpecSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  timeoutMS: z.number().int().positive().optional(),
});

export const BindingSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('port'), port: PortSchema }),
  z.object({ kind: z.literal('container'), name: z.string().min(1) }),
]);

export const StopSignalEnum = z.enum([
  'SIGTERM',
  'SIGINT',
  'SIGHUP',
  'SIGQUIT',
  'SIGKILL',
]);

const EscalationStepSchema = z.object({
  signal: StopSignalEnum,
  waitMS: z.number().int().min(0),
});

const ProcessRuntimeSchema = z.object({
  type: z.literal('process'),
  command: z.array(z.string().min(1)).min(1),
  cwd: z.string().optional(),
  env: z.record(z.string()).default({}),
  logFile: z.string().min(1).default('backend.log'),
});

const ContainerRuntimeSchema = z.object({
  type: z.literal('container'),
  image: z.string().min(1),
  runArgs: z.array(z.string()).default([]),
  stopTimeoutSeconds: z.number().int().min(0).optional(),
});

export const ServiceSchema = z
  .object({
    name: z.string().min(1).default('service'),
    binding: BindingSchema,
    host: z.string().min(1).default('localhost'),

    /** Health and endpoint port; defaults to the binding's port */
    port: PortSchema.optional(),
    healthPath: z.string().startsWith('/').default('/health'),
    maxAttempts: z.number().int().min(1).default(5),
    intervalMS: z.number().int().min(0).default(2000),
    requestTimeoutMS: z.number().int().positive().default(5000),
    gracePeriodMS: z.number().int().min(0).default(2000),
    forcedWaitMS: z.number().int().min(0).default(1000),
    escalation: z.array(EscalationStepSchema).min(1).optional(),
    runtime: z.discriminatedUnion('type', [
      ProcessRuntimeSchema,
      ContainerRuntimeSchema,
    ]),
  })
  .superRefine((service, ctx) => {
    if (service.binding.kind === 'container' && service.port === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['port'],
        message: 'A container binding needs the port of its health endpoint',
      });
    }

    const expectedRuntime =
      service.binding.kind === 'port' ? 'process' : 'container';

    if (service.runtime.type !== expectedRuntime) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['runtime', 'type'],
        message: `A ${service.binding.kind} binding needs the ${expectedRuntime} runtime`,
      });
    }
  });

const CommandListSchema = z.array(CommandSpecSchema).default([]);

const DeploySchema = z.discriminatedUnion('transport', [
  z.object({ transport: z.literal('local') }),
  z.object({
    transport: z.literal('command'),
    name: z.string().min(1).default('remote'),
    host: z.string().min(1),
    endpoint: HttpUrlSchema,
    healthURL: HttpUrlSchema,
    deployCommands: z.array(CommandSpecSchema).min(1),
    stopCommands: CommandListSchema,
    variables: z.record(z.string()).default({}),
  }),
]);

export const PipelineSchema = z.object({
  deployBranch: z.string().min(1).default('main'),
  strictBestEffort: z.boolean().default(false),
  runLogDirectory: z.string().optional(),

  /** Template over `buildID`, `runID`, `branch`, `commit` */
  artifactReference: z.string().min(1).default('{{buildID}}'),

  /** Reported after a successful local deploy instead of `http://host:port` */
  publicEndpoint: HttpUrlSchema.optional(),
  commands: z
    .object({
      checkout: CommandListSchema,
      staticCheck: CommandListSchema,
      test: CommandListSchema,
      buildArtifact: CommandListSchema,
    })
    .default({}),
  deploy: DeploySchema.default({ transport: 'local' }),
  notify: z
    .object({
      webhookURL: HttpUrlSchema.optional(),
      timeoutMS: z.number().int().positive().default(10_000),
    })
    .default({}),
});

export const WebhookSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: PortSchema.default(9000),
  path: z.string().startsWith('/').default('/webhook'),
  secret: z.string().min(1).optional(),
  bodyLimit: z.string().min(1).default('1mb'),
});

export const LoggingSchema = z.object({
  level: z.enum(LOG_LEVEL_NAMES).default('info'),
  colors: z.boolean().default(true),
  timestamps: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  service: ServiceSchema,
  pipeline: PipelineSchema.default({}),
  webhook: WebhookSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type ServiceRolloutConfig = z.infer<typeof ConfigSchema>;
export type ServiceRolloutConfigInput = z.input<typeof ConfigSchema>;
export type ServiceConfig = ServiceRolloutConfig['service'];
export type PipelineConfig = ServiceRolloutConfig['pipeline'];
export type WebhookConfig = ServiceRolloutConfig['webhook'];
export type LoggingConfig = ServiceRolloutConfig['logging'];
export type CommandSpecConfig = z.infer<typeof CommandSpecSchema>;
