// Configuration document handed to the service under test. Written once per
// environment into its private data directory; no environment reads another's.
import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { deepMerge, isPlainObject } from '../shared/objects.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';

export const SERVICE_CONFIG_FILE = 'config.yaml';

export interface ServiceConfigInput {
  host: string;
  port: number;
  dataDir: string;
  shutdownTimeoutSeconds: number;
  apiKey?: string;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

export function buildServiceConfig(input: ServiceConfigInput): Record<string, unknown> {
  return {
    service: {
      host: input.host,
      port: input.port,
      data_dir: input.dataDir,
      pid_file: path.join(input.dataDir, 'service.pid'),
      shutdown_timeout_seconds: input.shutdownTimeoutSeconds,
    },
    api: {
      enabled: true,
      api_key: input.apiKey ?? '',
    },
    mcp: {
      enabled: true,
    },
    logging: {
      level: input.logLevel ?? 'debug',
      format: 'text',
      output: ['stdout'],
    },
    index: {
      debounce_ms: 100,
      watch_enabled: true,
    },
  };
}

export async function readOverlay(overlayPath: string | null): Promise<Record<string, unknown>> {
  if (!overlayPath) return {};
  let raw: string;
  try {
    raw = await fs.readFile(overlayPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return {};
    throw err;
  }
  const parsed: unknown = parseYaml(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new HarnessError(HarnessErrorCode.SETUP_FAILED, `Service config overlay must be a mapping: ${overlayPath}`);
  }
  return parsed;
}

export function renderServiceConfig(config: Record<string, unknown>, overlay: Record<string, unknown> = {}): string {
  return stringifyYaml(deepMerge(config, overlay));
}

export async function writeServiceConfig(
  configPath: string,
  input: ServiceConfigInput,
  overlayPath: string | null
): Promise<void> {
  const overlay = await readOverlay(overlayPath);
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, renderServiceConfig(buildServiceConfig(input), overlay), 'utf-8');
}
