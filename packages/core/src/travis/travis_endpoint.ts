/**
 * TravisEndpoint - client for the Travis CI API v2
 *
 * Operations marked "auth" log in first when the endpoint holds no token,
 * exchanging the configured GitHub token for a Travis one.
 *
 * @module travis
 */

import {
  ApiEndpoint,
  CredentialError,
  HttpError,
  ResponseDecodeError,
  SyncTimeoutError,
} from '../endpoint';
import type { EndpointFetchFn, LazyResult } from '../endpoint';
import { encryptWithPublicKey } from '../crypto';
import { pollUntil, PollTimeoutError } from '../polling';
import type { PollCheck, PollOptions, PollPolicy } from '../polling';
import type {
  SyncOptions,
  TravisAccessTokenResponse,
  TravisBuildResponse,
  TravisEndpointOptions,
  TravisHooksResponse,
  TravisJobResponse,
  TravisKeyResponse,
  TravisRepoSettings,
  TravisRepositoryResponse,
  TravisSyncStatus,
  TravisUser,
  TravisUserResponse,
} from './travis_endpoint.types';

export const TRAVIS_API_URL = 'https://api.travis-ci.org';
export const TRAVIS_MEDIA_TYPE = 'application/vnd.travis-ci.2+json';

/** Under half a second of waiting (466.25 ms) before a sync is declared stuck */
export const DEFAULT_SYNC_POLICY: PollPolicy = {
  maxAttempts: 50,
  initialDelayMs: 2,
  factor: 1.5,
  maxDelayMs: 10,
};

/**
 * Travis CI API client.
 *
 * @example
 * ```typescript
 * const travis = new TravisEndpoint({ githubToken: process.env['GITHUB_TOKEN'] });
 * await travis.sync();
 * const secure = await travis.encrypt('octo-org', 'web', 'API_KEY=value');
 * ```
 */
export class TravisEndpoint extends ApiEndpoint {
  private readonly githubToken: string | undefined;
  private readonly syncPolicy: PollPolicy;
  private readonly sleep: PollOptions['sleep'];
  private pendingLogin: Promise<void> | null = null;
  private readonly keys = new Map<string, Promise<string>>();

  constructor(options: TravisEndpointOptions = {}, fetchFn?: EndpointFetchFn) {
    const { githubToken, syncPolicy, sleep, ...endpointOptions } = options;
    super({ name: 'TravisEndpoint', baseUrl: TRAVIS_API_URL, accept: TRAVIS_MEDIA_TYPE }, endpointOptions, fetchFn);
    this.githubToken = githubToken;
    this.syncPolicy = { ...DEFAULT_SYNC_POLICY, ...syncPolicy };
    this.sleep = sleep;
  }

  /** Travis expects the token quoted. */
  protected override formatAuthorization(token: string): string {
    return `token "${token}"`;
  }

  /**
   * Exchanges the GitHub token for a Travis token. Does nothing when a token
   * is already held; concurrent calls share one exchange.
   *
   * @throws CredentialError when there is no GitHub token to exchange
   * @throws HttpError when Travis refuses the exchange
   */
  override async login(): Promise<void> {
    if (this.token !== null) {
      this.log.info('Already logged into Travis');
      return;
    }
    if (!this.pendingLogin) {
      this.pendingLogin = this.exchangeGitHubToken().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  private async exchangeGitHubToken(): Promise<void> {
    if (!this.githubToken) {
      throw new CredentialError('TravisEndpoint needs a token or a GitHub token to log in');
    }

    const response = await this.request('/auth/github', {
      method: 'POST',
      payload: JSON.stringify({ github_token: this.githubToken }),
    });
    if (response.statusCode !== 200) {
      throw new HttpError(`GitHub token exchange returned ${response.statusCode}`, {
        operation: 'login',
        statusCode: response.statusCode,
        body: response.content,
      });
    }

    const { access_token } = this.parseJson<TravisAccessTokenResponse>(response, 'login');
    if (typeof access_token !== 'string') {
      throw new ResponseDecodeError('login: response has no access_token', response.content);
    }
    this.adoptCredential(access_token);
    this.log.info('Logged in to Travis');
  }

  // ═══════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════

  getRepository(owner: string, repo: string): LazyResult<TravisRepositoryResponse> {
    return this.requestJson<TravisRepositoryResponse>(`/repos/${owner}/${repo}`);
  }

  getBuild(buildId: number): LazyResult<TravisBuildResponse> {
    return this.requestJson<TravisBuildResponse>(`/builds/${buildId}`);
  }

  getJob(jobId: number): LazyResult<TravisJobResponse> {
    return this.requestJson<TravisJobResponse>(`/jobs/${jobId}`);
  }

  /** Hooks visible to the user (auth). */
  async getHooks(): Promise<LazyResult<TravisHooksResponse>> {
    await this.ensureAuthenticated();
    return this.requestJson<TravisHooksResponse>('/hooks');
  }

  // ═══════════════════════════════════════════════════════════════
  // SETTINGS & HOOKS
  // ═══════════════════════════════════════════════════════════════

  /**
   * Updates repository settings (auth).
   * @returns true when Travis answered 200
   */
  async updateSettings(repoId: number, settings: TravisRepoSettings): Promise<boolean> {
    await this.ensureAuthenticated();
    const response = await this.request(`/repos/${repoId}/settings`, {
      method: 'PATCH',
      payload: JSON.stringify({ settings }),
    });
    return response.statusCode === 200;
  }

  /**
   * Activates a hook (auth). Travis answers the per-hook route with a 500 for
   * some accounts, so a refusal is retried through the collection route.
   */
  async enableHook(hookId: number): Promise<true> {
    await this.ensureAuthenticated();
    const response = await this.request(`/hooks/${hookId}`, {
      method: 'PUT',
      payload: JSON.stringify({ hook: { active: true } }),
    });
    if (response.statusCode === 200) {
      return true;
    }

    this.log.warn(`PUT /hooks/${hookId} returned ${response.statusCode} (${response.content})`);
    this.log.info('Retrying with alternative API call');
    const retry = await this.request('/hooks', {
      method: 'PUT',
      payload: JSON.stringify({ hook: { id: hookId, active: true } }),
    });
    if (retry.statusCode !== 200) {
      throw new HttpError(`Attempt to enable hook ${hookId} returned ${retry.statusCode}`, {
        operation: 'enableHook',
        statusCode: retry.statusCode,
        body: retry.content,
      });
    }
    return true;
  }

  // ═══════════════════════════════════════════════════════════════
  // SYNC
  // ═══════════════════════════════════════════════════════════════

  private async fetchUser(): Promise<TravisUser> {
    const response = await this.request('/users/');
    if (response.statusCode !== 200) {
      throw new HttpError(`Attempt to retrieve the current user returned ${response.statusCode}`, {
        operation: 'sync',
        statusCode: response.statusCode,
        body: response.content,
      });
    }
    return this.parseJson<TravisUserResponse>(response, 'sync').user;
  }

  /**
   * Asks Travis to resync the user's repositories from GitHub (auth).
   *
   * @returns the finished sync, or null when not blocking
   * @throws SyncTimeoutError when the sync is still running after the last poll
   * @throws PollAbortedError when `signal` aborts while waiting
   */
  async sync(options: SyncOptions = {}): Promise<TravisSyncStatus | null> {
    const { block = true, signal } = options;
    await this.ensureAuthenticated();

    const response = await this.request('/users/sync', { method: 'POST' });
    // 409: a sync is already running
    if (response.statusCode !== 200 && response.statusCode !== 409) {
      throw new HttpError(`Sync request returned ${response.statusCode}`, {
        operation: 'sync',
        statusCode: response.statusCode,
        body: response.content,
      });
    }
    if (!block) {
      return null;
    }

    try {
      const { value: user, attempts } = await pollUntil(
        async (): Promise<PollCheck<TravisUser>> => {
          const user = await this.fetchUser();
          return user.is_syncing ? { done: false } : { done: true, value: user };
        },
        { ...this.syncPolicy, signal, sleep: this.sleep },
      );
      this.log.info(`Synchronised at ${user.synced_at} after ${attempts} polls`);
      return { syncedAt: user.synced_at, polls: attempts };
    } catch (error: unknown) {
      if (error instanceof PollTimeoutError) {
        throw new SyncTimeoutError(error.attempts);
      }
      throw error;
    }
  }

  /** Single check of the sync flag (auth). */
  async isSynced(): Promise<boolean> {
    await this.ensureAuthenticated();
    const user = await this.fetchUser();
    if (!user.is_syncing) {
      return true;
    }
    this.log.info('Still waiting for travis to synchronise');
    return false;
  }

  // ═══════════════════════════════════════════════════════════════
  // ENCRYPTION
  // ═══════════════════════════════════════════════════════════════

  /**
   * Public key of a repository (auth). Fetched once per repository; a failed
   * fetch is not cached.
   */
  async getKey(owner: string, repo: string): Promise<string> {
    await this.ensureAuthenticated();
    const slug = `${owner}/${repo}`;
    let key = this.keys.get(slug);
    if (!key) {
      key = this.fetchKey(slug).catch((error: unknown) => {
        this.keys.delete(slug);
        throw error;
      });
      this.keys.set(slug, key);
    }
    return key;
  }

  private async fetchKey(slug: string): Promise<string> {
    const response = await this.request(`/repos/${slug}/key`);
    if (response.statusCode !== 200) {
      throw new HttpError(`Attempt to retrieve the key of ${slug} returned ${response.statusCode}`, {
        operation: 'getKey',
        statusCode: response.statusCode,
        body: response.content,
      });
    }
    return this.parseJson<TravisKeyResponse>(response, 'getKey').key;
  }

  /**
   * Encrypts a value with the repository key (auth).
   * @returns base64 ciphertext for a `secure:` entry in .travis.yml
   */
  async encrypt(owner: string, repo: string, plaintext: string): Promise<string> {
    const key = await this.getKey(owner, repo);
    return encryptWithPublicKey(key, plaintext);
  }
}
