import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { BackendKind, HarnessConfig } from '../config/types.js';

/**
 * An external base URL wins outright; otherwise containerized only when asked
 * for (by the caller or the config), else a local process.
 */
export function selectBackend(config: HarnessConfig, requested?: BackendKind): BackendKind {
  if (config.externalBaseUrl) return 'external';
  const wanted = requested ?? config.backend;
  if (wanted === 'external') {
    throw new HarnessError(HarnessErrorCode.SETUP_FAILED, 'External backend requested but no base URL configured (TESTBED_BASE_URL)');
  }
  return wanted === 'containerized' ? 'containerized' : 'local';
}
