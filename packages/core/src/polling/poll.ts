/**
 * Bounded polling with capped exponential backoff.
 *
 * @module polling
 */

import { EndpointError } from '../endpoint/errors';

export type PollCheck<T> = { done: true; value: T } | { done: false };

export type PollPolicy = {
  /** Total number of checks before giving up */
  maxAttempts: number;
  /** Delay after the first failed check */
  initialDelayMs: number;
  /** Growth factor applied to the delay after each failed check */
  factor: number;
  /** Upper bound on a single delay */
  maxDelayMs: number;
};

export type PollOptions = PollPolicy & {
  signal?: AbortSignal;
  /** Injected by tests to avoid real delays */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type PollResult<T> = {
  value: T;
  /** Number of checks performed, including the successful one */
  attempts: number;
};

export class PollTimeoutError extends EndpointError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Condition not met after ${attempts} attempts`);
    this.name = 'PollTimeoutError';
    this.attempts = attempts;
    Object.setPrototypeOf(this, PollTimeoutError.prototype);
  }
}

export class PollAbortedError extends EndpointError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Polling aborted after ${attempts} attempts`);
    this.name = 'PollAbortedError';
    this.attempts = attempts;
    Object.setPrototypeOf(this, PollAbortedError.prototype);
  }
}

/** Delay before check number `attempt + 1`, counting from zero. */
export function backoffDelay(attempt: number, policy: PollPolicy): number {
  return Math.min(policy.maxDelayMs, policy.initialDelayMs * Math.pow(policy.factor, attempt));
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `check` until it reports done, at most `maxAttempts` times.
 *
 * @throws PollTimeoutError when every attempt reports not done
 * @throws PollAbortedError when `signal` aborts between or during waits
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollCheck<T>>,
  options: PollOptions,
): Promise<PollResult<T>> {
  const sleep = options.sleep ?? abortableSleep;

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new PollAbortedError(attempt);
    }

    const result = await check(attempt);
    if (result.done) {
      return { value: result.value, attempts: attempt + 1 };
    }

    if (attempt + 1 < options.maxAttempts) {
      try {
        await sleep(backoffDelay(attempt, options), options.signal);
      } catch (error: unknown) {
        if (options.signal?.aborted) {
          throw new PollAbortedError(attempt + 1);
        }
        throw error;
      }
    }
  }

  throw new PollTimeoutError(options.maxAttempts);
}
