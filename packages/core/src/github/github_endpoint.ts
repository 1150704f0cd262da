/**
 * GitHubEndpoint - client for the GitHub REST API v3
 *
 * Error contract, per operation:
 * - getUser, getRepos, getRepository, getFile, fork, createWebhook,
 *   cherryPick, merge: throw HttpError on an unexpected status
 * - getRepositoryAsync: never throws; inspect the LazyResult outcome
 * - getHead: null when the branch cannot be read
 * - commitFile: false when the write is refused
 *
 * @module github
 */

import { ApiEndpoint, HttpError, InvalidEncodingError, NotImplementedError } from '../endpoint';
import type { EndpointFetchFn, HttpResult, LazyResult } from '../endpoint';
import type {
  CherryPickOptions,
  CommitFileOptions,
  CommitFileParameters,
  ForkOptions,
  GitHubContentsResponse,
  GitHubEndpointOptions,
  GitHubRepository,
  GitHubUser,
  MergeOptions,
  MergeOutcome,
  MergeResult,
  WebhookOptions,
} from './github_endpoint.types';

export const GITHUB_API_URL = 'https://api.github.com';
export const GITHUB_MEDIA_TYPE = 'application/vnd.github.v3+json';

const MERGE_OUTCOMES: Partial<Record<number, MergeOutcome>> = {
  201: 'successful',
  202: 'accepted',
  204: 'no-op',
};

function readSha(value: unknown): string | null {
  if (typeof value === 'object' && value !== null && 'sha' in value && typeof value.sha === 'string') {
    return value.sha;
  }
  return null;
}

/** True for a JSON object, false for arrays and primitives. */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * GitHub REST API client.
 *
 * @example
 * ```typescript
 * const github = new GitHubEndpoint({ token: process.env['GITHUB_TOKEN'] });
 * const readme = await github.getFile('octo-org', 'web', 'README.md');
 * await github.commitFile('octo-org', 'web', {
 *   path: 'README.md',
 *   content: readme.toString('utf8') + '\nUpdated.\n',
 *   message: 'Update README',
 *   branch: 'main',
 * });
 * ```
 */
export class GitHubEndpoint extends ApiEndpoint {
  /** Current user, fetched once per endpoint */
  private currentUser: Promise<GitHubUser> | null = null;

  constructor(options: GitHubEndpointOptions = {}, fetchFn?: EndpointFetchFn) {
    super({ name: 'GitHubEndpoint', baseUrl: GITHUB_API_URL, accept: GITHUB_MEDIA_TYPE }, options, fetchFn);
  }

  // ═══════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════

  private httpError(operation: string, attempt: string, response: HttpResult): HttpError {
    return new HttpError(`${attempt} returned ${response.statusCode} (${response.content})`, {
      operation,
      statusCode: response.statusCode,
      body: response.content,
    });
  }

  private contentsResource(owner: string, repo: string, path: string): string {
    const encodedPath = path.split('/').map(encodeURIComponent).join('/');
    return `/repos/${owner}/${repo}/contents/${encodedPath}`;
  }

  private async fetchUser(): Promise<GitHubUser> {
    const response = await this.request('/user');
    if (response.statusCode !== 200) {
      throw this.httpError('getUser', 'Attempt to retrieve the current user', response);
    }
    return this.parseJson<GitHubUser>(response, 'getUser');
  }

  /** Merge commit SHA from a merge response, '' when there is none. */
  private extractMergeSha(response: HttpResult): string {
    let sha: string | null = null;
    let reason = 'no sha field';
    try {
      sha = readSha(JSON.parse(response.content));
    } catch (error: unknown) {
      reason = error instanceof Error ? error.message : String(error);
    }

    if (sha === null) {
      this.log.error(`Unable to extract sha from ${JSON.stringify(response.content)} (${reason})`);
      return '';
    }
    this.log.info(`Merge commit was ${sha}`);
    return sha;
  }

  // ═══════════════════════════════════════════════════════════════
  // USERS & REPOSITORIES
  // ═══════════════════════════════════════════════════════════════

  /**
   * The authenticated user. Fetched on first call and cached for the life of
   * the endpoint; concurrent first calls share one request. A failed fetch is
   * not cached.
   */
  getUser(): Promise<GitHubUser> {
    if (!this.currentUser) {
      this.currentUser = this.fetchUser().catch((error: unknown) => {
        this.currentUser = null;
        throw error;
      });
    }
    return this.currentUser;
  }

  /** Repositories owned by the authenticated user. */
  async getRepos(): Promise<GitHubRepository[]> {
    const { login } = await this.getUser();
    this.log.info(`Fetching repos for ${login}`);
    const response = await this.request(`/users/${login}/repos`);
    if (response.statusCode !== 200) {
      throw this.httpError('getRepos', `Attempt to list repos of ${login}`, response);
    }
    return this.parseJson<GitHubRepository[]>(response, 'getRepos');
  }

  /** Starts fetching a repository; resolve the result when needed. */
  getRepositoryAsync(owner: string, repo: string): LazyResult<GitHubRepository> {
    return this.requestJson<GitHubRepository>(`/repos/${owner}/${repo}`);
  }

  async getRepository(owner: string, repo: string): Promise<GitHubRepository> {
    const response = await this.request(`/repos/${owner}/${repo}`);
    if (response.statusCode !== 200) {
      throw this.httpError('getRepository', `Attempt to retrieve repo info ${owner}/${repo}`, response);
    }
    return this.parseJson<GitHubRepository>(response, 'getRepository');
  }

  /**
   * Raw bytes of a file.
   * @param ref branch, tag or SHA (default: the repository's default branch)
   */
  async getFile(owner: string, repo: string, path: string, ref?: string): Promise<Buffer> {
    const query = ref === undefined ? '' : `?ref=${encodeURIComponent(ref)}`;
    const response = await this.request(this.contentsResource(owner, repo, path) + query);
    if (response.statusCode !== 200) {
      throw this.httpError('getFile', `Attempt to retrieve ${owner}/${repo}/${path}`, response);
    }

    const file = this.parseJson<GitHubContentsResponse>(response, 'getFile');
    if (file.encoding !== 'base64') {
      throw new InvalidEncodingError(`${owner}/${repo}/${path}`, file.encoding);
    }
    return Buffer.from(file.content, 'base64');
  }

  /**
   * Forks a repository to the current user, or to an organization.
   * @returns the new repository as reported by the 202 response
   */
  async fork(owner: string, repo: string, options: ForkOptions = {}): Promise<GitHubRepository> {
    const { organization, block = true } = options;
    if (!block) {
      throw new NotImplementedError("Haven't implemented non-blocking fork yet");
    }

    let payload: string | undefined;
    let fullName: string;
    if (organization) {
      payload = JSON.stringify({ organization });
      fullName = `${organization}/${repo}`;
    } else {
      const user = await this.getUser();
      fullName = `${user.login}/${repo}`;
    }

    const response = await this.request(`/repos/${owner}/${repo}/forks`, { method: 'POST', payload });
    if (response.statusCode !== 202) {
      throw this.httpError('fork', `Attempt to create fork of ${owner}/${repo}`, response);
    }

    this.log.info(`Forking ${owner}/${repo} to ${fullName} returned ${response.statusCode}`);
    return this.parseJson<GitHubRepository>(response, 'fork');
  }

  /**
   * Creates a JSON webhook on a repository.
   *
   * `insecureSsl` defaults to true: GitHub has rejected certificates from some
   * free certificate authorities when delivering hooks.
   */
  async createWebhook(owner: string, repo: string, options: WebhookOptions): Promise<true> {
    const { url, secret, events = ['push'], insecureSsl = true } = options;
    const config: Record<string, string> = { url, content_type: 'json', secret };
    if (insecureSsl) {
      config['insecure_ssl'] = '1';
    }

    const response = await this.request(`/repos/${owner}/${repo}/hooks`, {
      method: 'POST',
      payload: JSON.stringify({ name: 'web', active: true, events, config }),
    });
    if (response.statusCode !== 201) {
      throw this.httpError('createWebhook', `Attempt to create webhook on ${owner}/${repo}`, response);
    }
    return true;
  }

  // ═══════════════════════════════════════════════════════════════
  // REFS, COMMITS & MERGES
  // ═══════════════════════════════════════════════════════════════

  /**
   * SHA at the tip of a branch, or null when it cannot be read.
   *
   * A name that only prefixes existing branches gets a 200 listing every
   * match; that is not a head either.
   */
  async getHead(owner: string, repo: string, branch: string = 'master'): Promise<string | null> {
    const response = await this.request(`/repos/${owner}/${repo}/git/refs/heads/${branch}`);
    if (response.statusCode !== 200) {
      return null;
    }

    let body: unknown;
    try {
      body = JSON.parse(response.content);
    } catch (error: unknown) {
      this.log.warn(`Unreadable ref for ${owner}/${repo}@${branch}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    const sha = isRecord(body) ? readSha(body['object']) : null;
    if (sha === null) {
      this.log.warn(`No single ref for ${owner}/${repo}@${branch}`);
    }
    return sha;
  }

  /**
   * Creates or replaces a single file with one commit.
   *
   * @returns true when the file was created (201) or updated (200)
   * @throws HttpError when the existing file cannot be looked up, or the
   * path names something other than a file
   */
  async commitFile(owner: string, repo: string, options: CommitFileOptions): Promise<boolean> {
    const { path, content, message, branch = 'master' } = options;
    const resource = this.contentsResource(owner, repo, path);

    const lookup = await this.request(`${resource}?ref=${encodeURIComponent(branch)}`);
    let existingSha: string | null = null;
    if (lookup.statusCode === 200) {
      existingSha = readSha(this.parseJson<unknown>(lookup, 'commitFile'));
      if (existingSha === null) {
        throw new HttpError(`${owner}/${repo}/${path} is not a file on ${branch}`, {
          operation: 'commitFile',
          statusCode: lookup.statusCode,
          body: lookup.content,
        });
      }
    } else if (lookup.statusCode !== 404) {
      throw this.httpError('commitFile', `Attempt to look up ${owner}/${repo}/${path}`, lookup);
    }

    const user = await this.getUser();
    const parameters: CommitFileParameters = {
      path,
      message,
      branch,
      content: Buffer.from(content).toString('base64'),
    };
    // Without both fields GitHub attributes the commit to the token's user
    if (user.name && user.email) {
      parameters.committer = { name: user.name, email: user.email };
    }
    if (existingSha !== null) {
      parameters.sha = existingSha;
    }

    const response = await this.request(resource, { method: 'PUT', payload: JSON.stringify(parameters) });
    if (existingSha === null) {
      return response.statusCode === 201;
    }
    return response.statusCode === 200;
  }

  /**
   * Moves a branch to `sha`.
   * @returns the SHA the branch now points at
   */
  async cherryPick(owner: string, repo: string, sha: string, options: CherryPickOptions = {}): Promise<string> {
    const { branch = 'master', force = false } = options;
    const response = await this.request(`/repos/${owner}/${repo}/git/refs/heads/${branch}`, {
      method: 'PATCH',
      payload: JSON.stringify({ sha, force }),
    });

    const msg = `${owner}/${repo} <- ${sha}`;
    if (response.statusCode === 200) {
      this.log.info(`Cherry-picked ${msg}`);
      return sha;
    }
    throw new HttpError(`Cherry-pick failed: ${msg} (${response.statusCode})`, {
      operation: 'cherryPick',
      statusCode: response.statusCode,
      body: response.content,
    });
  }

  /**
   * Merges `sha` into a base branch.
   *
   * @throws HttpError on a conflict (409), a missing base or head (404) or
   * any other status outside 201/202/204
   */
  async merge(owner: string, repo: string, sha: string, options: MergeOptions = {}): Promise<MergeResult> {
    const { base = 'master' } = options;
    const response = await this.request(`/repos/${owner}/${repo}/merges`, {
      method: 'POST',
      payload: JSON.stringify({ base, head: sha }),
    });

    const msg = `${owner}/${repo} <- ${sha}`;
    const outcome = MERGE_OUTCOMES[response.statusCode];
    if (outcome) {
      this.log.info(`Merge ${outcome} (${msg})`);
      return { outcome, sha: this.extractMergeSha(response) };
    }

    if (response.statusCode === 409) {
      this.log.warn(`Merge conflict! (${msg})`);
    } else if (response.statusCode === 404) {
      this.log.warn(`Merge base or head doesn't exist! (${msg})`);
    } else {
      this.log.warn(`Unknown status ${response.statusCode} (${msg}) -> ${response.content}`);
    }

    throw new HttpError(`Merge attempt failed: ${msg} (${response.statusCode})`, {
      operation: 'merge',
      statusCode: response.statusCode,
      body: response.content,
    });
  }
}
