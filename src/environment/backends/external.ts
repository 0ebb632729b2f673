import { HarnessError, HarnessErrorCode } from '../../shared/errors.js';
import { waitFor } from '../../shared/poll.js';
import { probeHealth } from '../../http/client.js';
import type { HarnessConfig } from '../../config/types.js';
import type { Backend } from '../types.js';

/** A service someone else runs. Readiness is one bounded health wait; stop() leaves it alone. */
export class ExternalBackend implements Backend {
  readonly kind = 'external' as const;
  readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly config: HarnessConfig
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async start(signal?: AbortSignal): Promise<void> {
    const { timeouts, service } = this.config;
    const outcome = await waitFor(() => probeHealth(this.baseUrl, service.healthPath, timeouts.probeRequestMs), {
      timeoutMs: timeouts.externalReadinessMs,
      intervalMs: timeouts.pollIntervalMs,
      signal,
    });
    if (!outcome.ok) {
      throw new HarnessError(
        HarnessErrorCode.READINESS_TIMEOUT,
        `External service at ${this.baseUrl} not healthy after ${outcome.elapsedMs}ms` +
          (outcome.lastError ? ` (last error: ${outcome.lastError})` : ''),
        { elapsedMs: outcome.elapsedMs, lastError: outcome.lastError }
      );
    }
  }

  async stop(): Promise<void> {
    // not ours to stop
  }
}
