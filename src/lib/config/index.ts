export * from './schema';
export * from './errors';
export {
  DEFAULT_CONFIG_FILE,
  ENV_LOG_LEVEL,
  ENV_WEBHOOK_SECRET,
  applyEnvOverrides,
  formatIssue,
  loadConfigFile,
  parseConfig,
  resolveConfigPaths,
} from './load-config';
export type { ConfigEnvironment, LoadedConfig } from './load-config';
export { servicePort, serviceEndpoint, serviceHealthURL } from './endpoints';
