export { loadConfig, validateConfig, applyEnvOverrides } from './config_loader';
export { HOOKLINE_CONFIG_SCHEMA } from './config_schema';
export { ConfigError } from './errors';
export type {
  HooklineConfig,
  GitHubConfig,
  TravisConfig,
  SyncPolicyConfig,
  ConfigEnv,
  LoadConfigOptions,
} from './config.types';
