/**
 * Types for TravisEndpoint (Travis CI API v2).
 */

import type { EndpointOptions } from '../endpoint';
import type { PollOptions, PollPolicy } from '../polling';

export type TravisEndpointOptions = EndpointOptions & {
  /** GitHub token exchanged for a Travis token when no token is given */
  githubToken?: string;
  /** Overrides for the sync polling bounds */
  syncPolicy?: Partial<PollPolicy>;
  /** Wait between sync polls (default: timer-based) */
  sleep?: PollOptions['sleep'];
};

export type TravisAccessTokenResponse = {
  access_token: string;
};

export type TravisUser = {
  id: number;
  login: string;
  name?: string;
  is_syncing: boolean;
  /** ISO timestamp of the last completed sync */
  synced_at: string | null;
};

export type TravisUserResponse = {
  user: TravisUser;
};

export type TravisRepository = {
  id: number;
  /** "owner/name" */
  slug: string;
  active: boolean;
  description: string | null;
  last_build_id: number | null;
  last_build_state: string | null;
};

export type TravisRepositoryResponse = {
  repo: TravisRepository;
};

export type TravisBuild = {
  id: number;
  repository_id: number;
  number: string;
  state: string;
  job_ids: number[];
};

export type TravisBuildResponse = {
  build: TravisBuild;
};

export type TravisJob = {
  id: number;
  build_id: number;
  number: string;
  state: string;
};

export type TravisJobResponse = {
  job: TravisJob;
};

export type TravisHook = {
  id: number;
  name: string;
  owner_name: string;
  active: boolean;
};

export type TravisHooksResponse = {
  hooks: TravisHook[];
};

export type TravisKeyResponse = {
  /** PEM-encoded RSA public key */
  key: string;
  fingerprint?: string;
};

/**
 * Repository settings accepted by PATCH /repos/:id/settings.
 */
export type TravisRepoSettings = {
  builds_only_with_travis_yml?: boolean;
  build_pushes?: boolean;
  build_pull_requests?: boolean;
  maximum_number_of_builds?: number;
  [setting: string]: unknown;
};

export type SyncOptions = {
  /** Wait until the sync completes (default: true) */
  block?: boolean;
  signal?: AbortSignal;
};

export type TravisSyncStatus = {
  syncedAt: string | null;
  /** Number of user polls, including the one that saw the sync finished */
  polls: number;
};
