/**
 * Custom Error Classes for endpoints
 *
 * Every error raised by an endpoint extends EndpointError, so callers can
 * tell library failures apart from their own.
 */

/**
 * Base error class for all endpoint errors
 */
export class EndpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EndpointError';
    Object.setPrototypeOf(this, EndpointError.prototype);
  }
}

export type HttpErrorDetails = {
  /** Operation that failed, e.g. "fork" or "merge" */
  operation: string;
  /** Status code returned by the remote API, absent when none was seen */
  statusCode?: number;
  /** Raw response body */
  body?: string;
};

/**
 * Error thrown when a raising operation gets a status code it does not accept
 */
export class HttpError extends EndpointError {
  public readonly operation: string;
  public readonly statusCode: number | undefined;
  public readonly body: string | undefined;

  constructor(message: string, details: HttpErrorDetails) {
    super(message);
    this.name = 'HttpError';
    this.operation = details.operation;
    this.statusCode = details.statusCode;
    this.body = details.body;
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

/**
 * Error thrown when the CI sync flag does not clear within the poll bound
 */
export class SyncTimeoutError extends HttpError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Failed to sync within ${attempts} polls`, { operation: 'sync' });
    this.name = 'SyncTimeoutError';
    this.attempts = attempts;
    Object.setPrototypeOf(this, SyncTimeoutError.prototype);
  }
}

/**
 * Error thrown when a request never produced a response
 * (network failure, deadline, oversized body)
 */
export class TransportError extends EndpointError {
  public readonly url: string;

  constructor(message: string, url: string, cause?: unknown) {
    super(message);
    this.name = 'TransportError';
    this.url = url;
    this.cause = cause;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Error thrown when a body that should be JSON is not
 */
export class ResponseDecodeError extends EndpointError {
  public readonly content: string;

  constructor(message: string, content: string) {
    super(message);
    this.name = 'ResponseDecodeError';
    this.content = content;
    Object.setPrototypeOf(this, ResponseDecodeError.prototype);
  }
}

/**
 * Error thrown when file contents arrive in an encoding other than base64
 */
export class InvalidEncodingError extends EndpointError {
  public readonly encoding: string;

  constructor(path: string, encoding: string) {
    super(`Expected base64 content for ${path}, got '${encoding}'`);
    this.name = 'InvalidEncodingError';
    this.encoding = encoding;
    Object.setPrototypeOf(this, InvalidEncodingError.prototype);
  }
}

/**
 * Error thrown when a credential is replaced or cannot be obtained
 */
export class CredentialError extends EndpointError {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
    Object.setPrototypeOf(this, CredentialError.prototype);
  }
}

/**
 * Error thrown for operations that exist only in their blocking form
 */
export class NotImplementedError extends EndpointError {
  constructor(message: string) {
    super(message);
    this.name = 'NotImplementedError';
    Object.setPrototypeOf(this, NotImplementedError.prototype);
  }
}

export function isEndpointError(error: unknown): error is EndpointError {
  return error instanceof EndpointError;
}
