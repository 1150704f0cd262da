export { ApiEndpoint } from './endpoint';
export type { EndpointProfile } from './endpoint';
export { LazyResult } from './lazy_result';
export type { LazyOutcome, LazyResultOptions } from './lazy_result';
export { buildRequest, redactBody, redactHeaders, DEFAULT_USER_AGENT } from './request_builder';
export { sendRequest, toFetchInit, defaultFetch, DEFAULT_MAX_RESPONSE_BYTES } from './fetch_transport';
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
} from './errors';
export type { HttpErrorDetails } from './errors';
export type {
  HttpMethod,
  RequestOptions,
  EndpointRequest,
  RequestDefaults,
  HttpResult,
  EndpointFetchFn,
  EndpointFetchInit,
  EndpointFetchResponse,
  EndpointBodyReader,
  EndpointOptions,
  JsonRequestOptions,
} from './endpoint.types';
