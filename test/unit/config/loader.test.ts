import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { CONFIG_FILE_NAME, defaultConfig, findProjectRoot, loadConfig } from '../../../src/config/loader.js';
import { HarnessError, HarnessErrorCode } from '../../../src/shared/errors.js';

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'testbed-config-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('returns the defaults when no file or env is present', () => {
    const config = loadConfig({ projectRoot: root, env: {} });
    expect(config).toEqual(defaultConfig(root));
    expect(config.resultsRoot).toBe(path.join(root, 'tests', 'results'));
    expect(config.timeouts.readinessMs).toBe(30000);
    expect(config.timeouts.suiteMs).toBe(600000);
  });

  it('deep-merges the YAML file over the defaults', async () => {
    await fs.writeFile(
      path.join(root, CONFIG_FILE_NAME),
      ['resultsRoot: out/results', 'timeouts:', '  readinessMs: 1500', 'service:', '  binaryName: svc', ''].join('\n')
    );
    const config = loadConfig({ projectRoot: root, env: {} });
    expect(config.resultsRoot).toBe(path.join(root, 'out', 'results'));
    expect(config.timeouts.readinessMs).toBe(1500);
    expect(config.timeouts.shutdownGraceMs).toBe(5000);
    expect(config.service.binaryName).toBe('svc');
    expect(config.service.healthPath).toBe('/health');
  });

  it('applies env overrides after the file', async () => {
    await fs.writeFile(path.join(root, CONFIG_FILE_NAME), 'backend: local\n');
    const config = loadConfig({
      projectRoot: root,
      env: { TESTBED_BASE_URL: 'http://svc.test:8080/', TESTBED_BACKEND: 'containerized', TESTBED_RESULTS_DIR: '/tmp/r' },
    });
    expect(config.externalBaseUrl).toBe('http://svc.test:8080');
    expect(config.backend).toBe('containerized');
    expect(config.resultsRoot).toBe('/tmp/r');
  });

  it('rejects an unknown backend name', () => {
    expect(() => loadConfig({ projectRoot: root, env: { TESTBED_BACKEND: 'cloud' } })).toThrow(
      expect.objectContaining({ code: HarnessErrorCode.SETUP_FAILED })
    );
  });

  it('reports schema violations as SETUP_FAILED with the offending path', () => {
    let issues: unknown;
    try {
      loadConfig({ projectRoot: root, env: {}, overrides: { timeouts: { readinessMs: -1 } } });
    } catch (err) {
      issues = err instanceof HarnessError ? err.context : undefined;
    }
    expect(issues).toEqual({ issues: [expect.stringContaining('timeouts.readinessMs')] });
  });
});

describe('findProjectRoot', () => {
  it('walks up to the directory holding package.json', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'testbed-root-'));
    try {
      await fs.writeFile(path.join(root, 'package.json'), '{}');
      const nested = path.join(root, 'a', 'b');
      await fs.mkdir(nested, { recursive: true });
      expect(findProjectRoot(nested)).toBe(root);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});
