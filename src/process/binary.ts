import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { run, runOrThrow } from '../shared/exec.js';
import type { CommandRunner } from '../shared/exec.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import type { HarnessConfig } from '../config/types.js';

const log = componentLogger('binary');

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves the service binary: TESTBED_SERVICE_BINARY first, then PATH, then
 * the configured candidate paths (relative to the project root).
 */
export async function findBinary(config: HarnessConfig, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const explicit = env['TESTBED_SERVICE_BINARY'];
  const candidates: string[] = [];
  if (explicit) candidates.push(path.resolve(config.projectRoot, explicit));
  for (const dir of (env['PATH'] ?? '').split(path.delimiter).filter(Boolean)) {
    candidates.push(path.join(dir, config.service.binaryName));
  }
  for (const p of config.service.binaryPaths) {
    candidates.push(path.resolve(config.projectRoot, p));
  }

  for (const candidate of candidates) {
    if (await isExecutable(candidate)) return candidate;
  }
  throw new HarnessError(HarnessErrorCode.BINARY_NOT_FOUND, `Service binary "${config.service.binaryName}" not found`, {
    searched: candidates,
  });
}

let buildOnce: Promise<void> | null = null;

// Runs the configured build command at most once per test run; a failed build
// is remembered so every environment reports the same setup-fatal error.
export function buildBinary(config: HarnessConfig, runner: CommandRunner = run): Promise<void> {
  const command = config.service.buildCommand;
  if (!command || command.length === 0) return Promise.resolve();
  buildOnce ??= (async () => {
    const [bin, ...args] = command;
    log.info({ command: command.join(' ') }, 'building service binary');
    try {
      await runOrThrow(runner, bin, args, { cwd: config.projectRoot, timeoutMs: 600_000 });
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.SETUP_FAILED, `Service build failed: ${command.join(' ')}`, {
        ...(err instanceof HarnessError ? err.context : {}),
      }, { cause: err });
    }
  })();
  return buildOnce;
}

export function resetBuildState(): void {
  buildOnce = null;
}
