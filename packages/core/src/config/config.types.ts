import type { LogLevel } from '../logger';

/**
 * Backoff settings for waiting on a CI account sync.
 */
export type SyncPolicyConfig = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
};

export type GitHubConfig = {
  /** API base URL, e.g. a GitHub Enterprise `/api/v3` root */
  baseUrl?: string;
  token?: string;
};

export type TravisConfig = {
  baseUrl?: string;
  /** Travis access token */
  token?: string;
  /** GitHub token exchanged for a Travis token on login */
  githubToken?: string;
};

/**
 * Hookline configuration, as read from a YAML or JSON file and the environment.
 */
export type HooklineConfig = {
  userAgent?: string;
  logLevel?: LogLevel;
  github?: GitHubConfig;
  travis?: TravisConfig;
  sync?: SyncPolicyConfig;
};

export type ConfigEnv = Record<string, string | undefined>;

export type LoadConfigOptions = {
  /** Configuration file; falls back to HOOKLINE_CONFIG */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: ConfigEnv;
};
