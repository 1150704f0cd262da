import { abortableSleep, backoffDelay, pollUntil, PollAbortedError, PollTimeoutError } from './poll';
import type { PollCheck, PollPolicy } from './poll';
import { isEndpointError } from '../endpoint/errors';

const policy: PollPolicy = { maxAttempts: 5, initialDelayMs: 10, factor: 2, maxDelayMs: 50 };

function notDone(): PollCheck<string> {
  return { done: false };
}

describe('backoffDelay', () => {
  it('should grow by the factor and stop at the cap', () => {
    const delays = [0, 1, 2, 3, 4].map(attempt => backoffDelay(attempt, policy));

    expect(delays).toEqual([10, 20, 40, 50, 50]);
  });

  it('should stay constant with a factor of one', () => {
    expect(backoffDelay(7, { ...policy, factor: 1 })).toBe(10);
  });
});

describe('pollUntil', () => {
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;

  beforeEach(() => {
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  it('should return the value and attempt count once the check is done', async () => {
    const check = jest.fn<Promise<PollCheck<string>>, [number]>()
      .mockResolvedValueOnce(notDone())
      .mockResolvedValueOnce(notDone())
      .mockResolvedValueOnce({ done: true, value: 'synced' });

    const result = await pollUntil(check, { ...policy, sleep });

    expect(result).toEqual({ value: 'synced', attempts: 3 });
    expect(sleep.mock.calls.map(call => call[0])).toEqual([10, 20]);
  });

  it('should not sleep when the first check succeeds', async () => {
    const result = await pollUntil(async () => ({ done: true, value: 1 }), { ...policy, sleep });

    expect(result.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should give up after maxAttempts checks without a trailing sleep', async () => {
    const check = jest.fn(async () => notDone());

    const error = await pollUntil(check, { ...policy, sleep }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PollTimeoutError);
    expect((error as PollTimeoutError).attempts).toBe(5);
    expect(check).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it('should stop before the next check once aborted', async () => {
    const controller = new AbortController();
    const check = jest.fn(async () => {
      controller.abort();
      return notDone();
    });

    const error = await pollUntil(check, { ...policy, sleep, signal: controller.signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PollAbortedError);
    expect(isEndpointError(error)).toBe(true);
    expect(check).toHaveBeenCalledTimes(1);
  });

  it('should interrupt a pending sleep when aborted', async () => {
    const controller = new AbortController();
    const check = jest.fn(async () => notDone());
    const started = pollUntil(check, { ...policy, initialDelayMs: 60_000, maxDelayMs: 60_000, signal: controller.signal });

    await new Promise(resolve => setImmediate(resolve));
    controller.abort();

    const error = await started.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PollAbortedError);
    expect((error as PollAbortedError).attempts).toBe(1);
  });

  it('should propagate errors thrown by the check', async () => {
    const failure = new Error('lookup failed');

    await expect(pollUntil(async () => { throw failure; }, { ...policy, sleep })).rejects.toBe(failure);
  });
});

describe('abortableSleep', () => {
  it('should reject at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(abortableSleep(10_000, controller.signal)).rejects.toThrow('stop');
  });

  it('should resolve after the delay', async () => {
    await expect(abortableSleep(1)).resolves.toBeUndefined();
  });
});
