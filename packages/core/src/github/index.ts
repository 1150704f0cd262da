export { GitHubEndpoint, GITHUB_API_URL, GITHUB_MEDIA_TYPE } from './github_endpoint';
export type {
  GitHubEndpointOptions,
  GitHubUser,
  GitHubRepository,
  GitHubContentsResponse,
  GitHubRefResponse,
  CommitFileParameters,
  ForkOptions,
  WebhookOptions,
  CommitFileOptions,
  CherryPickOptions,
  MergeOptions,
  MergeOutcome,
  MergeResult,
} from './github_endpoint.types';
