import { Config, GitHubEndpoint, Logger, TravisEndpoint } from '@hookline/core';

/**
 * Endpoint Factory for the hookline CLI
 *
 * Loads configuration once (file named by HOOKLINE_CONFIG, then environment)
 * and builds each endpoint from it on first use.
 */
export class EndpointFactory {
  private static instance: EndpointFactory | null = null;
  private config: Promise<Config.HooklineConfig> | null = null;
  private github: GitHubEndpoint | null = null;
  private travis: TravisEndpoint | null = null;

  private constructor(private readonly env: Config.ConfigEnv) { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): EndpointFactory {
    if (!EndpointFactory.instance) {
      EndpointFactory.instance = new EndpointFactory(process.env);
    }
    return EndpointFactory.instance;
  }

  /**
   * Drops the singleton so the next getInstance() reads the environment again
   */
  static resetInstance(): void {
    EndpointFactory.instance = null;
  }

  getConfig(): Promise<Config.HooklineConfig> {
    if (!this.config) {
      this.config = Config.loadConfig({ env: this.env });
    }
    return this.config;
  }

  async getGitHubEndpoint(): Promise<GitHubEndpoint> {
    if (this.github) {
      return this.github;
    }

    const config = await this.getConfig();
    this.github = new GitHubEndpoint({
      token: config.github?.token,
      baseUrl: config.github?.baseUrl,
      userAgent: config.userAgent,
      // The CLI prints its own results; endpoint chatter starts at warn
      logger: Logger.createLogger('[GitHubEndpoint] ', config.logLevel ?? 'warn'),
    });
    return this.github;
  }

  async getTravisEndpoint(): Promise<TravisEndpoint> {
    if (this.travis) {
      return this.travis;
    }

    const config = await this.getConfig();
    this.travis = new TravisEndpoint({
      token: config.travis?.token,
      githubToken: config.travis?.githubToken ?? config.github?.token,
      baseUrl: config.travis?.baseUrl,
      userAgent: config.userAgent,
      syncPolicy: config.sync,
      logger: Logger.createLogger('[TravisEndpoint] ', config.logLevel ?? 'warn'),
    });
    return this.travis;
  }
}
