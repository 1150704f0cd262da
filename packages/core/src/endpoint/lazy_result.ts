/**
 * LazyResult - a request already in flight whose JSON body is decoded on demand.
 *
 * The request starts when the LazyResult is created. Waiting for it and
 * decoding the body happen once, on the first resolve(); every later call
 * returns the same outcome. Failures never reject: a transport or decode
 * failure is logged and reported as `{ ok: false }`.
 */

import type { Logger } from '../logger';
import type { HttpResult } from './endpoint.types';
import { ResponseDecodeError, TransportError } from './errors';

export type LazyOutcome<T> =
  | {
    ok: true;
    statusCode: number;
    /** Whether statusCode is one of the valid codes */
    accepted: boolean;
    data: T;
  }
  | {
    ok: false;
    error: TransportError | ResponseDecodeError;
  };

export type LazyResultOptions<T> = {
  /** Log label, e.g. "GET: https://api.github.com/repos/o/r" */
  label: string;
  log: Logger;
  /** Status codes treated as accepted (default: [200]) */
  validCodes?: readonly number[];
  /** Body decoder (default: JSON.parse) */
  decode?: (content: string) => T;
};

type PendingResponse =
  | { ok: true; result: HttpResult }
  | { ok: false; error: TransportError };

function parseJson<T>(content: string): T {
  return JSON.parse(content);
}

export class LazyResult<T> {
  private readonly pending: Promise<PendingResponse>;
  private readonly label: string;
  private readonly log: Logger;
  private readonly validCodes: readonly number[];
  private readonly decode: (content: string) => T;
  private outcome: Promise<LazyOutcome<T>> | null = null;
  private settled = false;

  constructor(request: Promise<HttpResult>, options: LazyResultOptions<T>) {
    this.label = options.label;
    this.log = options.log;
    this.validCodes = options.validCodes ?? [200];
    this.decode = options.decode ?? parseJson;
    // Converted up front so an unresolved LazyResult never leaves a rejection unhandled
    this.pending = request.then(
      (result): PendingResponse => ({ ok: true, result }),
      (error: unknown): PendingResponse => ({
        ok: false,
        error: error instanceof TransportError
          ? error
          : new TransportError(`${this.label} failed (${String(error)})`, this.label, error),
      }),
    );
  }

  /** True once the first resolve() has finished. */
  get isResolved(): boolean {
    return this.settled;
  }

  /**
   * Waits for the response and decodes it, at most once.
   */
  resolve(): Promise<LazyOutcome<T>> {
    if (!this.outcome) {
      this.outcome = this.settle();
    }
    return this.outcome;
  }

  /**
   * Decoded body regardless of status, or null when nothing could be decoded.
   */
  async get(): Promise<T | null> {
    const outcome = await this.resolve();
    return outcome.ok ? outcome.data : null;
  }

  private async settle(): Promise<LazyOutcome<T>> {
    const outcome = await this.settleOnce();
    this.settled = true;
    return outcome;
  }

  private async settleOnce(): Promise<LazyOutcome<T>> {
    const response = await this.pending;
    if (!response.ok) {
      this.log.error(`Failed to retrieve ${this.label} (${response.error.message})`);
      return { ok: false, error: response.error };
    }

    const { statusCode, content } = response.result;
    const message = `${this.label} ${statusCode} (returned ${Buffer.byteLength(content, 'utf8')} bytes)`;

    let data: T;
    try {
      data = this.decode(content);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.error(`${message} could not be decoded (${reason})`);
      return {
        ok: false,
        error: new ResponseDecodeError(`${this.label} returned a body that is not JSON: ${reason}`, content),
      };
    }

    const accepted = this.validCodes.includes(statusCode);
    if (accepted) {
      this.log.debug(message);
      this.log.debug(JSON.stringify(data, null, 4));
    } else {
      this.log.warn(message);
      this.log.info(JSON.stringify(data, null, 4));
    }

    return { ok: true, statusCode, accepted, data };
  }
}
