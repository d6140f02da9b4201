import { withRetry, type RetryConfig, type RetryLog } from '../src/utils/retry.js';

const fastConfig: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1,
  maxDelayMs: 4,
  multiplier: 2,
  timeoutMs: 1000,
};

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    const fn = jest.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, fastConfig)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('retries with growing delays and logs each attempt', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('busy'))
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValue('ok');
    const logs: RetryLog[] = [];

    await expect(withRetry(fn, fastConfig, (log) => logs.push(log))).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(logs.map(({ attempt, success, delay, nextRetryInMs }) => ({ attempt, success, delay, nextRetryInMs }))).toEqual([
      { attempt: 1, success: false, delay: 1, nextRetryInMs: 1 },
      { attempt: 2, success: false, delay: 2, nextRetryInMs: 2 },
      { attempt: 3, success: true, delay: 0, nextRetryInMs: undefined },
    ]);
  });

  test('gives up after the last attempt', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('boom'));
    await expect(withRetry(fn, { ...fastConfig, maxAttempts: 2 })).rejects.toThrow(
      'Failed after 2 attempts. Last error: boom'
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });

  test('an attempt that outlives the timeout fails', async () => {
    const fn = () => new Promise<string>(() => undefined);
    await expect(withRetry(fn, { ...fastConfig, maxAttempts: 1, timeoutMs: 10 })).rejects.toThrow(
      'Failed after 1 attempts. Last error: Timeout after 10ms'
    );
  });

  test('non-Error rejections are wrapped', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue('plain failure');
    await expect(withRetry(fn, { ...fastConfig, maxAttempts: 1 })).rejects.toThrow('Last error: plain failure');
  });
});
