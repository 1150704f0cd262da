/**
 * Types for GitHubEndpoint.
 *
 * Response types describe the subset of each GitHub payload this package
 * reads; the remote objects carry many more fields.
 */

import type { EndpointOptions } from '../endpoint';

export type GitHubEndpointOptions = EndpointOptions;

/**
 * GitHub API authenticated user response (subset).
 */
export type GitHubUser = {
  login: string;
  id: number;
  /** Display name, null when the profile has none */
  name: string | null;
  /** Public email, null when hidden */
  email: string | null;
};

/**
 * GitHub API repository response (subset).
 */
export type GitHubRepository = {
  id: number;
  name: string;
  /** "owner/name" */
  full_name: string;
  owner: { login: string };
  private: boolean;
  default_branch: string;
  html_url: string;
  fork?: boolean;
};

/**
 * Response from GitHub Contents API for a single file.
 * @see https://docs.github.com/en/rest/repos/contents
 */
export type GitHubContentsResponse = {
  name: string;
  path: string;
  /** SHA of the blob */
  sha: string;
  size: number;
  /** Encoded file content */
  content: string;
  /** Content encoding ('base64') */
  encoding: string;
};

/**
 * GitHub API Ref response.
 */
export type GitHubRefResponse = {
  /** Ref name (e.g., "refs/heads/main") */
  ref: string;
  object: {
    type: string;
    sha: string;
  };
};

/**
 * Body of a Contents API PUT.
 */
export type CommitFileParameters = {
  path: string;
  message: string;
  branch: string;
  /** Base64-encoded file content */
  content: string;
  committer?: { name: string; email: string };
  /** Blob SHA of the file being replaced */
  sha?: string;
};

export type ForkOptions = {
  /** Fork into this organization instead of the current user */
  organization?: string;
  /** Only blocking forks are supported (default: true) */
  block?: boolean;
};

export type WebhookOptions = {
  /** URL the hook delivers to */
  url: string;
  /** Shared secret used to sign deliveries */
  secret: string;
  /** Events that trigger the hook (default: ['push']) */
  events?: string[];
  /** Skip TLS verification on delivery (default: true) */
  insecureSsl?: boolean;
};

export type CommitFileOptions = {
  path: string;
  content: string | Buffer;
  message: string;
  /** Target branch (default: 'master') */
  branch?: string;
};

export type CherryPickOptions = {
  /** Branch whose ref is moved (default: 'master') */
  branch?: string;
  /** Allow a non-fast-forward update (default: false) */
  force?: boolean;
};

export type MergeOptions = {
  /** Branch merged into (default: 'master') */
  base?: string;
};

/**
 * 201 = merge commit created, 202 = merge accepted, 204 = nothing to merge
 */
export type MergeOutcome = 'successful' | 'accepted' | 'no-op';

export type MergeResult = {
  outcome: MergeOutcome;
  /** Merge commit SHA, empty when the response carried none */
  sha: string;
};
