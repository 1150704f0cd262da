/**
 * Configuration loader
 *
 * Reads an optional YAML/JSON file, validates it with AJV and layers
 * environment overrides on top:
 *
 * | Variable              | Sets              |
 * |-----------------------|-------------------|
 * | HOOKLINE_CONFIG       | file to read      |
 * | HOOKLINE_USER_AGENT   | userAgent         |
 * | LOG_LEVEL             | logLevel          |
 * | GITHUB_TOKEN          | github.token      |
 * | GITHUB_API_URL        | github.baseUrl    |
 * | TRAVIS_TOKEN          | travis.token      |
 * | TRAVIS_API_URL        | travis.baseUrl    |
 * | TRAVIS_GITHUB_TOKEN   | travis.githubToken |
 */

import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import { isLogLevel } from '../logger';
import type { ConfigEnv, HooklineConfig, LoadConfigOptions } from './config.types';
import { HOOKLINE_CONFIG_SCHEMA } from './config_schema';
import { ConfigError } from './errors';

let validator: ValidateFunction<HooklineConfig> | null = null;

function getValidator(): ValidateFunction<HooklineConfig> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    addFormats(ajv);
    validator = ajv.compile<HooklineConfig>(HOOKLINE_CONFIG_SCHEMA);
  }
  return validator;
}

/**
 * Checks a parsed configuration against the schema.
 * @throws ConfigError listing every violation
 */
export function validateConfig(value: unknown): HooklineConfig {
  const validate = getValidator();
  if (!validate(value)) {
    const details = (validate.errors ?? []).map(
      error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`,
    );
    throw new ConfigError(`Invalid configuration: ${details.join('; ')}`, details);
  }
  return value;
}

async function readConfigFile(configPath: string): Promise<HooklineConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read configuration file ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file ${configPath} is not valid YAML: ${message}`);
  }

  // An empty file is an empty configuration
  if (parsed === undefined || parsed === null) {
    return {};
  }
  return validateConfig(parsed);
}

/**
 * Layers environment variables over a configuration. Unknown LOG_LEVEL
 * values are ignored, as the logger does.
 */
export function applyEnvOverrides(config: HooklineConfig, env: ConfigEnv): HooklineConfig {
  const result: HooklineConfig = {
    ...config,
    github: { ...config.github },
    travis: { ...config.travis },
  };

  const userAgent = env['HOOKLINE_USER_AGENT'];
  if (userAgent) result.userAgent = userAgent;

  const logLevel = env['LOG_LEVEL'];
  if (isLogLevel(logLevel)) result.logLevel = logLevel;

  const githubToken = env['GITHUB_TOKEN'];
  if (githubToken) result.github = { ...result.github, token: githubToken };
  const githubUrl = env['GITHUB_API_URL'];
  if (githubUrl) result.github = { ...result.github, baseUrl: githubUrl };

  const travisToken = env['TRAVIS_TOKEN'];
  if (travisToken) result.travis = { ...result.travis, token: travisToken };
  const travisUrl = env['TRAVIS_API_URL'];
  if (travisUrl) result.travis = { ...result.travis, baseUrl: travisUrl };
  const travisGithubToken = env['TRAVIS_GITHUB_TOKEN'];
  if (travisGithubToken) result.travis = { ...result.travis, githubToken: travisGithubToken };

  return validateConfig(result);
}

/**
 * Loads configuration from file (when one is named) and environment.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<HooklineConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env['HOOKLINE_CONFIG'];
  const fileConfig = configPath ? await readConfigFile(configPath) : {};
  return applyEnvOverrides(fileConfig, env);
}
