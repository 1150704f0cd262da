import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { applyEnvOverrides, loadConfig, validateConfig } from './config_loader';
import { ConfigError } from './errors';
import { isEndpointError } from '../endpoint/errors';

describe('validateConfig', () => {
  it('should accept a complete configuration', () => {
    const config = {
      userAgent: 'Hookline/1.0.0',
      logLevel: 'debug',
      github: { baseUrl: 'https://ghe.example.test/api/v3', token: 'test-token' },
      travis: { token: 'travis-test-token', githubToken: 'test-token' },
      sync: { maxAttempts: 10, initialDelayMs: 5, maxDelayMs: 100, factor: 2 },
    };

    expect(validateConfig(config)).toBe(config);
  });

  it('should report every violation', () => {
    const error = (() => {
      try {
        validateConfig({ logLevel: 'loud', github: { baseUrl: 'not a url' }, sync: { maxAttempts: 0 } });
        return null;
      } catch (e: unknown) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect((error as ConfigError).details).toEqual([
      '/logLevel must be equal to one of the allowed values',
      '/github/baseUrl must match format "uri"',
      '/sync/maxAttempts must be >= 1',
    ]);
  });

  it('should reject unknown keys', () => {
    expect(() => validateConfig({ gitlab: {} })).toThrow(
      'Invalid configuration: / must NOT have additional properties',
    );
  });
});

describe('applyEnvOverrides', () => {
  it('should layer environment values over the file values', () => {
    const config = applyEnvOverrides(
      { github: { token: 'file-token' }, travis: { baseUrl: 'https://travis.example.test' } },
      {
        GITHUB_TOKEN: 'env-token',
        TRAVIS_TOKEN: 'travis-env-token',
        TRAVIS_GITHUB_TOKEN: 'exchange-token',
        HOOKLINE_USER_AGENT: 'ci-bot/2.0',
        LOG_LEVEL: 'warn',
      },
    );

    expect(config).toEqual({
      userAgent: 'ci-bot/2.0',
      logLevel: 'warn',
      github: { token: 'env-token' },
      travis: {
        baseUrl: 'https://travis.example.test',
        token: 'travis-env-token',
        githubToken: 'exchange-token',
      },
    });
  });

  it('should ignore an unknown LOG_LEVEL', () => {
    expect(applyEnvOverrides({}, { LOG_LEVEL: 'chatty' }).logLevel).toBeUndefined();
  });

  it('should validate URLs that come from the environment', () => {
    expect(() => applyEnvOverrides({}, { GITHUB_API_URL: 'nowhere' })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hookline-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should read a YAML file named by the caller', async () => {
    const configPath = path.join(tmpDir, 'hookline.yaml');
    await fs.writeFile(configPath, [
      'logLevel: info',
      'github:',
      '  token: test-token',
      'sync:',
      '  maxAttempts: 20',
    ].join('\n'));

    const config = await loadConfig({ configPath, env: {} });

    expect(config).toEqual({
      logLevel: 'info',
      github: { token: 'test-token' },
      travis: {},
      sync: { maxAttempts: 20 },
    });
  });

  it('should read JSON through HOOKLINE_CONFIG', async () => {
    const configPath = path.join(tmpDir, 'hookline.json');
    await fs.writeFile(configPath, JSON.stringify({ travis: { token: 'travis-test-token' } }));

    const config = await loadConfig({ env: { HOOKLINE_CONFIG: configPath } });

    expect(config.travis).toEqual({ token: 'travis-test-token' });
  });

  it('should treat an empty file as an empty configuration', async () => {
    const configPath = path.join(tmpDir, 'empty.yaml');
    await fs.writeFile(configPath, '');

    await expect(loadConfig({ configPath, env: {} })).resolves.toEqual({ github: {}, travis: {} });
  });

  it('should work from the environment alone', async () => {
    await expect(loadConfig({ env: { GITHUB_TOKEN: 'test-token' } })).resolves.toEqual({
      github: { token: 'test-token' },
      travis: {},
    });
  });

  it('should fail for a missing file', async () => {
    const configPath = path.join(tmpDir, 'absent.yaml');

    const error = await loadConfig({ configPath, env: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(isEndpointError(error)).toBe(true);
    expect(error).toHaveProperty('message', expect.stringContaining(`Cannot read configuration file ${configPath}`));
  });

  it('should fail for malformed YAML', async () => {
    const configPath = path.join(tmpDir, 'broken.yaml');
    await fs.writeFile(configPath, 'github: [unclosed');

    await expect(loadConfig({ configPath, env: {} })).rejects.toThrow(
      `Configuration file ${configPath} is not valid YAML`,
    );
  });
});
