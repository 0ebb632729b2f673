import { HarnessError, HarnessErrorCode, errorMessage } from './errors.js';

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new HarnessError(HarnessErrorCode.CANCELLED, 'Cancelled'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new HarnessError(HarnessErrorCode.CANCELLED, 'Cancelled'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

export interface WaitOutcome {
  ok: boolean;
  elapsedMs: number;
  lastError?: string;
}

/**
 * Polls `check` until it resolves true or the deadline passes. A check that
 * throws counts as "not yet" and its message is kept as `lastError`.
 * Cancellation through `signal` rejects with CANCELLED.
 */
export async function waitFor(check: () => Promise<boolean>, options: WaitOptions): Promise<WaitOutcome> {
  const start = Date.now();
  let lastError: string | undefined;
  for (;;) {
    if (options.signal?.aborted) {
      throw new HarnessError(HarnessErrorCode.CANCELLED, 'Cancelled while waiting', { lastError });
    }
    try {
      if (await check()) return { ok: true, elapsedMs: Date.now() - start };
      lastError = undefined;
    } catch (err) {
      lastError = errorMessage(err);
    }
    const elapsedMs = Date.now() - start;
    if (elapsedMs >= options.timeoutMs) return { ok: false, elapsedMs, lastError };
    await sleep(Math.min(options.intervalMs, options.timeoutMs - elapsedMs), options.signal);
  }
}

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  attempts: number,
  delayMs: number,
  onFailure?: (attempt: number, err: unknown) => void
): Promise<T> {
  let lastErr: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      onFailure?.(attempt, err);
      if (attempt < attempts) await sleep(delayMs);
    }
  }
  throw lastErr;
}

// Combines an optional parent signal with a deadline.
export function deadlineSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return parent ? AbortSignal.any([parent, timeout]) : timeout;
}

/** Resolves true if `promise` settles within `ms`, false otherwise. Never rejects. */
export function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise(resolve => {
    const timer = setTimeout(() => resolve(false), ms);
    promise.then(
      () => { clearTimeout(timer); resolve(true); },
      () => { clearTimeout(timer); resolve(true); }
    );
  });
}
