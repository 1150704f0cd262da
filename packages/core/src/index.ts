export * as Endpoint from "./endpoint";
export * as GitHub from "./github";
export * as Travis from "./travis";
export * as Config from "./config";
export * as Crypto from "./crypto";
export * as Logger from "./logger";
export * as Polling from "./polling";

// Endpoint clients
export { GitHubEndpoint } from "./github";
export { TravisEndpoint } from "./travis";
export { LazyResult } from "./endpoint";
export type { LazyOutcome } from "./endpoint";

// Errors
export {
  EndpointError,
  HttpError,
  SyncTimeoutError,
  TransportError,
  ResponseDecodeError,
  InvalidEncodingError,
  CredentialError,
  NotImplementedError,
  isEndpointError,
} from "./endpoint";
export { ConfigError } from "./config";
export { EncryptionError } from "./crypto";
export { PollAbortedError } from "./polling";
