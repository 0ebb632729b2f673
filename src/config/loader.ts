// Harness config: optional testbed.yaml deep-merged over defaultConfig(), then
// environment overrides, then validated. Add new fields to types.ts and to
// defaultConfig() together.
import { readFileSync, existsSync } from 'node:fs';
import { join, isAbsolute, resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { HarnessConfigSchema, BackendKindSchema } from './types.js';
import type { HarnessConfig } from './types.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { deepMerge, isPlainObject } from '../shared/objects.js';

const log = componentLogger('config');

export const CONFIG_FILE_NAME = 'testbed.yaml';

export function defaultConfig(projectRoot: string): HarnessConfig {
  return {
    projectRoot,
    resultsRoot: join(projectRoot, 'tests', 'results'),
    service: {
      binaryName: 'service',
      binaryPaths: ['tests/bin/service', 'bin/service'],
      buildCommand: null,
      args: ['serve', '--config', '{config}'],
      healthPath: '/health',
      internalPort: 19000,
    },
    containers: {
      networkDriver: 'bridge',
      serviceImage: 'service-test:latest',
      driverImage: 'driver-test:latest',
      serviceDockerfile: null,
      driverDockerfile: null,
      serviceAlias: 'service',
      driverAlias: 'driver',
      driverHome: '/home/testuser',
      driverUser: 'testuser',
      credentialsPath: join(homedir(), '.config', 'service-testbed', 'credentials.json'),
      credentialsTarget: '.config/service-testbed/credentials.json',
    },
    timeouts: {
      readinessMs: 30_000,
      externalReadinessMs: 10_000,
      shutdownGraceMs: 5_000,
      forceKillWaitMs: 2_000,
      portReleaseMs: 5_000,
      containerStartupMs: 60_000,
      driverStartupMs: 30_000,
      suiteMs: 600_000,
      browserMs: 60_000,
      requestMs: 30_000,
      probeRequestMs: 2_000,
      pollIntervalMs: 100,
      sseReadMs: 5_000,
    },
    portRangeStart: 19000,
    portProbeAttempts: 100,
    forwardEnv: ['SERVICE_API_KEY'],
    externalBaseUrl: null,
    backend: null,
    serviceConfigOverlay: null,
  };
}

/** Walks up from `start` to the first directory holding a package.json. */
export function findProjectRoot(start: string = process.cwd()): string {
  let dir = resolve(start);
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) return dir;
    const parent = resolve(dir, '..');
    if (parent === dir) return resolve(start);
    dir = parent;
  }
}

export interface LoadConfigOptions {
  projectRoot?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Record<string, unknown>;
}

export function loadConfig(options: LoadConfigOptions = {}): HarnessConfig {
  const env = options.env ?? process.env;
  const projectRoot = options.projectRoot ?? findProjectRoot();
  const configPath = options.configPath ?? env['TESTBED_CONFIG'] ?? join(projectRoot, CONFIG_FILE_NAME);

  let merged: Record<string, unknown> = defaultConfig(projectRoot);

  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.SETUP_FAILED, `Failed to parse ${configPath}`, undefined, { cause: err });
    }
    if (isPlainObject(parsed)) {
      merged = deepMerge(merged, parsed);
      log.debug({ configPath }, 'loaded harness config file');
    }
  }

  merged = deepMerge(merged, envOverrides(env));
  if (options.overrides) merged = deepMerge(merged, options.overrides);

  const result = HarnessConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new HarnessError(HarnessErrorCode.SETUP_FAILED, 'Invalid harness configuration', {
      issues: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
  }
  const config = result.data;
  config.resultsRoot = isAbsolute(config.resultsRoot) ? config.resultsRoot : join(projectRoot, config.resultsRoot);
  return config;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const baseUrl = env['TESTBED_BASE_URL'];
  if (baseUrl) out['externalBaseUrl'] = baseUrl.replace(/\/+$/, '');

  const backend = env['TESTBED_BACKEND'];
  if (backend) {
    const parsed = BackendKindSchema.safeParse(backend);
    if (!parsed.success) {
      throw new HarnessError(HarnessErrorCode.SETUP_FAILED, `TESTBED_BACKEND must be local or containerized, got "${backend}"`);
    }
    out['backend'] = parsed.data;
  }

  const resultsDir = env['TESTBED_RESULTS_DIR'];
  if (resultsDir) out['resultsRoot'] = resultsDir;
  return out;
}
