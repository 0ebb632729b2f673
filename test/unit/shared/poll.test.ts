import { HarnessError, HarnessErrorCode } from '../../../src/shared/errors.js';
import { retry, settlesWithin, sleep, waitFor } from '../../../src/shared/poll.js';

describe('waitFor', () => {
  it('resolves ok once the check passes', async () => {
    let calls = 0;
    const outcome = await waitFor(async () => ++calls >= 3, { timeoutMs: 1000, intervalMs: 5 });
    expect(outcome.ok).toBe(true);
    expect(calls).toBe(3);
  });

  it('reports the last error when the deadline passes', async () => {
    const outcome = await waitFor(
      async () => {
        throw new Error('connection refused');
      },
      { timeoutMs: 30, intervalMs: 5 }
    );
    expect(outcome.ok).toBe(false);
    expect(outcome.lastError).toBe('connection refused');
    expect(outcome.elapsedMs).toBeGreaterThanOrEqual(30);
  });

  it('rejects with CANCELLED when the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    await expect(
      waitFor(async () => false, { timeoutMs: 5000, intervalMs: 5, signal: controller.signal })
    ).rejects.toMatchObject({ code: HarnessErrorCode.CANCELLED });
  });
});

describe('sleep', () => {
  it('rejects immediately for an aborted signal', async () => {
    await expect(sleep(1000, AbortSignal.abort())).rejects.toBeInstanceOf(HarnessError);
  });
});

describe('retry', () => {
  it('returns the first success and reports earlier failures', async () => {
    const failures: number[] = [];
    const result = await retry(
      async attempt => {
        if (attempt < 3) throw new Error(`attempt ${attempt}`);
        return 'done';
      },
      5,
      1,
      attempt => failures.push(attempt)
    );
    expect(result).toBe('done');
    expect(failures).toEqual([1, 2]);
  });

  it('rethrows the last error after all attempts', async () => {
    await expect(retry(async attempt => Promise.reject(new Error(`attempt ${attempt}`)), 2, 1)).rejects.toThrow('attempt 2');
  });
});

describe('settlesWithin', () => {
  it('distinguishes settled from pending promises', async () => {
    expect(await settlesWithin(Promise.reject(new Error('x')), 50)).toBe(true);
    expect(await settlesWithin(new Promise(() => undefined), 10)).toBe(false);
  });
});
