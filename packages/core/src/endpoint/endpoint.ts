/**
 * ApiEndpoint - base class for the REST endpoint clients
 *
 * Owns everything the concrete clients share: the request builder defaults,
 * the write-once credential, logging, and the two request forms:
 * - request(): awaits the exchange and returns status and raw body
 * - requestJson(): starts the exchange and returns a LazyResult
 *
 * @module endpoint
 */

import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type {
  EndpointFetchFn,
  EndpointOptions,
  EndpointRequest,
  HttpResult,
  JsonRequestOptions,
  RequestOptions,
} from './endpoint.types';
import { CredentialError, ResponseDecodeError } from './errors';
import { DEFAULT_MAX_RESPONSE_BYTES, defaultFetch, sendRequest } from './fetch_transport';
import { LazyResult } from './lazy_result';
import { buildRequest, DEFAULT_USER_AGENT, redactBody, redactHeaders } from './request_builder';

/**
 * Fixed facts about a remote API, supplied by each subclass.
 */
export type EndpointProfile = {
  /** Class name, used for the log prefix */
  name: string;
  /** Public API base URL */
  baseUrl: string;
  /** Accept media type */
  accept: string;
};

export abstract class ApiEndpoint {
  protected readonly log: Logger;
  protected readonly baseUrl: string;
  private readonly name: string;
  private readonly accept: string;
  private readonly userAgent: string;
  private readonly maxResponseBytes: number;
  private readonly fetchFn: EndpointFetchFn;
  private credential: string | null = null;

  constructor(profile: EndpointProfile, options: EndpointOptions = {}, fetchFn?: EndpointFetchFn) {
    this.name = profile.name;
    this.baseUrl = (options.baseUrl ?? profile.baseUrl).replace(/\/+$/, '');
    this.accept = profile.accept;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
    this.fetchFn = fetchFn ?? defaultFetch;
    this.log = options.logger ?? createLogger(`[${profile.name}] `);

    if (options.token !== undefined) {
      this.adoptCredential(options.token);
    }
    this.log.info(`Created endpoint for ${this.baseUrl} (${this.credential === null ? 'anonymous' : 'authenticated'})`);
  }

  /** The credential held, or null before login. */
  get token(): string | null {
    return this.credential;
  }

  /**
   * Stores the credential. An endpoint holds one credential for its whole
   * life; replacing it is a caller error.
   */
  protected adoptCredential(token: string): void {
    if (this.credential !== null) {
      this.log.error('Token has been set multiple times');
      throw new CredentialError(
        `${this.name} already holds a credential; create a new endpoint to use a different one`,
      );
    }
    this.credential = token;
  }

  /** Authorization header value for a credential. */
  protected formatAuthorization(token: string): string {
    return `token ${token}`;
  }

  /**
   * Obtains a credential. Endpoints without a login flow need a token up front.
   */
  protected async login(): Promise<void> {
    throw new CredentialError(`${this.name} has no login flow; pass a token when creating it`);
  }

  /** Guard for operations that need a credential. */
  protected async ensureAuthenticated(): Promise<void> {
    if (this.credential === null) {
      await this.login();
    }
  }

  protected buildRequest(options: RequestOptions = {}): EndpointRequest {
    return buildRequest(options, {
      userAgent: this.userAgent,
      accept: this.accept,
      authorization: this.credential === null ? null : this.formatAuthorization(this.credential),
    });
  }

  /**
   * Sends a request and waits for the raw result. Does not decode the body.
   *
   * @throws TransportError when no response arrives
   */
  async request(resource: string, options: RequestOptions = {}): Promise<HttpResult> {
    const request = this.buildRequest(options);
    const url = this.baseUrl + resource;
    const result = await sendRequest(this.fetchFn, url, request, this.maxResponseBytes);

    const message = `${request.method}: ${url} ${result.statusCode} (returned ${Buffer.byteLength(result.content, 'utf8')} bytes)`;
    if (result.statusCode >= 200 && result.statusCode < 300) {
      this.log.info(message);
      this.log.debug('Sent: %j', redactHeaders(request.headers));
      this.log.debug('payload: %s', redactBody(request.payload ?? ''));
      this.log.debug('Got:  %s', redactBody(result.content));
    } else {
      this.log.warn(message);
      this.log.info('Sent: %j', redactHeaders(request.headers));
      this.log.debug('payload: %s', redactBody(request.payload ?? ''));
      this.log.info(redactBody(result.content));
    }
    return result;
  }

  /**
   * Starts a request and returns immediately. The JSON body is decoded when
   * the returned LazyResult is first resolved.
   */
  requestJson<T>(resource: string, options: JsonRequestOptions = {}): LazyResult<T> {
    const { validCodes, ...requestOptions } = options;
    const request = this.buildRequest(requestOptions);
    const url = this.baseUrl + resource;

    return new LazyResult<T>(sendRequest(this.fetchFn, url, request, this.maxResponseBytes), {
      label: `${request.method}: ${url}`,
      log: this.log,
      validCodes,
    });
  }

  /**
   * Decodes a JSON body from a completed request.
   *
   * @throws ResponseDecodeError when the body is not JSON
   */
  protected parseJson<T>(result: HttpResult, operation: string): T {
    try {
      return JSON.parse(result.content);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResponseDecodeError(`${operation}: response is not JSON (${reason})`, result.content);
    }
  }
}
