import { promises as fsPromises } from 'fs';
import path from 'path';
import type { ZodIssue } from 'zod';
import { isPlainObject } from '../type-guards';
import { ConfigLoadError, ConfigValidationError } from './errors';
import { ConfigSchema } from './schema';
import type { CommandSpecConfig, ServiceRolloutConfig } from './schema';

export const DEFAULT_CONFIG_FILE = 'service-rollout.config.json';
export const ENV_LOG_LEVEL = 'SERVICE_ROLLOUT_LOG_LEVEL';
export const ENV_WEBHOOK_SECRET = 'SERVICE_ROLLOUT_WEBHOOK_SECRET';

export type ConfigEnvironment = Record<string, string | undefined>;

export function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';

  return `${location}: ${issue.message}`;
}

function withOverride(
  raw: Record<string, unknown>,
  section: string,
  key: string,
  value: string | undefined,
): Record<string, unknown> {
  if (value === undefined || value === '') {
    return raw;
  }

  const current = raw[section];

  return {
    ...raw,
    [section]: { ...(isPlainObject(current) ? current : {}), [key]: value },
  };
}

/**
 * Environment variables win over the file
 */
export function applyEnvOverrides(
  raw: unknown,
  env: ConfigEnvironment,
): unknown {
  if (!isPlainObject(raw)) {
    return raw;
  }

  let result = withOverride(
    raw,
    'logging',
    'level',
    env[ENV_LOG_LEVEL]?.toLowerCase(),
  );
  result = withOverride(result, 'webhook', 'secret', env[ENV_WEBHOOK_SECRET]);

  return result;
}

/**
 * Validate a parsed configuration object, applying defaults
 */
export function parseConfig(
  raw: unknown,
  env: ConfigEnvironment = {},
  filePath?: string,
): ServiceRolloutConfig {
  const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env));

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(formatIssue),
      filePath,
    );
  }

  return result.data;
}

/**
 * Relative paths in the file are relative to the file's directory, which is
 * also the default working directory of the service and of stage commands
 */
export function resolveConfigPaths(
  config: ServiceRolloutConfig,
  baseDirectory: string,
): ServiceRolloutConfig {
  const resolve = (value: string | undefined): string =>
    value === undefined ? baseDirectory : path.resolve(baseDirectory, value);
  const resolveCommands = (specs: CommandSpecConfig[]): CommandSpecConfig[] =>
    specs.map((spec) => ({ ...spec, cwd: resolve(spec.cwd) }));

  const { runtime } = config.service;
  const { commands, runLogDirectory, deploy } = config.pipeline;

  return {
    ...config,
    service: {
      ...config.service,
      runtime:
        runtime.type === 'process'
          ? { ...runtime, cwd: resolve(runtime.cwd) }
          : runtime,
    },
    pipeline: {
      ...config.pipeline,
      runLogDirectory:
        runLogDirectory === undefined ? undefined : resolve(runLogDirectory),
      commands: {
        checkout: resolveCommands(commands.checkout),
        staticCheck: resolveCommands(commands.staticCheck),
        test: resolveCommands(commands.test),
        buildArtifact: resolveCommands(commands.buildArtifact),
      },
      deploy:
        deploy.transport === 'command'
          ? {
              ...deploy,
              deployCommands: resolveCommands(deploy.deployCommands),
              stopCommands: resolveCommands(deploy.stopCommands),
            }
          : deploy,
    },
  };
}

export interface LoadedConfig {
  config: ServiceRolloutConfig;
  filePath: string;
}

export async function loadConfigFile(
  filePath: string = DEFAULT_CONFIG_FILE,
  env: ConfigEnvironment = process.env,
): Promise<LoadedConfig> {
  const absolutePath = path.resolve(filePath);
  let text: string;

  try {
    text = await fsPromises.readFile(absolutePath, 'utf8');
  } catch (error) {
    const notFound =
      error instanceof Error && 'code' in error && error.code === 'ENOENT';

    throw new ConfigLoadError(
      notFound
        ? `Config file not found: ${absolutePath}`
        : `Could not read config file ${absolutePath}`,
      notFound ? 'NotFound' : 'Unreadable',
      absolutePath,
      error,
    );
  }

  let raw: unknown;

  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigLoadError(
      `Config file ${absolutePath} is not valid JSON`,
      'InvalidJSON',
      absolutePath,
      error,
    );
  }

  const config = parseConfig(raw, env, absolutePath);

  return {
    config: resolveConfigPaths(config, path.dirname(absolutePath)),
    filePath: absolutePath,
  };
}
