export { TravisEndpoint, TRAVIS_API_URL, TRAVIS_MEDIA_TYPE, DEFAULT_SYNC_POLICY } from './travis_endpoint';
export type {
  TravisEndpointOptions,
  TravisAccessTokenResponse,
  TravisUser,
  TravisUserResponse,
  TravisRepository,
  TravisRepositoryResponse,
  TravisBuild,
  TravisBuildResponse,
  TravisJob,
  TravisJobResponse,
  TravisHook,
  TravisHooksResponse,
  TravisKeyResponse,
  TravisRepoSettings,
  SyncOptions,
  TravisSyncStatus,
} from './travis_endpoint.types';
