/**
 * Types for the endpoint transport layer.
 */

import type { Dispatcher } from 'undici';
import type { Logger } from '../logger';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Per-call request options.
 */
export type RequestOptions = {
  /** Serialized request body */
  payload?: string;
  /** HTTP method (default: 'GET') */
  method?: HttpMethod;
  /** Extra headers; endpoint defaults never override these */
  headers?: Record<string, string>;
  /** Truncate oversized bodies instead of failing (default: false) */
  allowTruncated?: boolean;
  /** Follow 3xx responses (default: true) */
  followRedirects?: boolean;
  /** Deadline in seconds */
  deadline?: number;
  /** Verify the server certificate (default: true) */
  validateCertificate?: boolean;
};

/**
 * Fully built, immutable request.
 */
export type EndpointRequest = Readonly<{
  payload: string | undefined;
  method: HttpMethod;
  headers: Readonly<Record<string, string>>;
  allowTruncated: boolean;
  followRedirects: boolean;
  deadline: number | undefined;
  validateCertificate: boolean;
}>;

/**
 * Endpoint-level values the request builder folds into every request.
 */
export type RequestDefaults = {
  userAgent: string;
  /** Accept media type, empty for none */
  accept: string;
  /** Authorization header value, null when no credential is held */
  authorization: string | null;
};

/**
 * Raw result of a completed request.
 */
export type HttpResult = {
  statusCode: number;
  content: string;
  headers: Record<string, string>;
  /** True when the body was cut at maxResponseBytes */
  truncated: boolean;
};

/**
 * Init object handed to the fetch function.
 */
export type EndpointFetchInit = {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  redirect: 'follow' | 'manual';
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
};

/**
 * Reader over a response body stream.
 */
export type EndpointBodyReader = {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
};

/**
 * The subset of a fetch Response the transport reads. When `body` is
 * present it is read chunk by chunk and `text()` is not called.
 */
export type EndpointFetchResponse = {
  status: number;
  headers: { forEach(callback: (value: string, key: string) => void): void };
  body?: { getReader(): EndpointBodyReader } | null;
  text(): Promise<string>;
};

/**
 * HTTP fetch function signature for dependency injection (testability).
 * Defaults to undici's fetch in production.
 * In tests, inject a mock function to avoid real HTTP calls.
 */
export type EndpointFetchFn = (url: string, init: EndpointFetchInit) => Promise<EndpointFetchResponse>;

/**
 * Options shared by every endpoint.
 */
export type EndpointOptions = {
  /** Credential sent as `Authorization: token <token>` */
  token?: string;
  /** API base URL (default: the endpoint's public API) */
  baseUrl?: string;
  /** User-Agent header (default: 'Hookline/1.0.0') */
  userAgent?: string;
  /** Logger (default: console logger prefixed with the class name) */
  logger?: Logger;
  /** Largest body accepted before truncating or failing (default: 32 MiB) */
  maxResponseBytes?: number;
};

/**
 * Options for deferred JSON requests.
 */
export type JsonRequestOptions = RequestOptions & {
  /** Status codes treated as accepted (default: [200]) */
  validCodes?: readonly number[];
};
