import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { ResultStore, SUMMARY_JSON, SUMMARY_MD, TEST_LOG, sanitizeName } from '../../../src/results/store.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';

describe('ResultStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'testbed-results-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lays out results/<kind>/<name>/data', async () => {
    const store = await ResultStore.create(root, 'api', 'health check');
    expect(store.dir).toBe(path.join(root, 'api', 'health_check'));
    expect((await fs.stat(store.dataDir)).isDirectory()).toBe(true);
  });

  it('wipes the previous run of the same test', async () => {
    const first = await ResultStore.create(root, 'api', 'rerun');
    await first.save('marker.txt', 'stale');

    const second = await ResultStore.create(root, 'api', 'rerun');

    await expect(fs.access(path.join(second.dir, 'marker.txt'))).rejects.toThrow();
    expect(await fs.readdir(second.dir)).toEqual(['data']);
  });

  it('appends timestamped lines to test.log', async () => {
    const store = await ResultStore.create(root, 'api', 'logging');
    store.log('GET %s -> %d', '/health', 200);
    store.log('plain line');

    const lines = (await fs.readFile(path.join(store.dir, TEST_LOG), 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] GET \/health -> 200$/);
    expect(lines[1]).toMatch(/\] plain line$/);
  });

  it('does not throw when the log cannot be written', async () => {
    const store = await ResultStore.create(root, 'api', 'gone');
    await fs.rm(store.dir, { recursive: true });
    expect(() => store.log('still fine')).not.toThrow();
  });

  it('saves JSON artifacts with two-space indentation', async () => {
    const store = await ResultStore.create(root, 'api', 'json');
    const file = await store.saveJSON('response.json', { status: 'ok' });
    expect(await fs.readFile(file, 'utf-8')).toBe('{\n  "status": "ok"\n}');
  });

  it('refuses artifact names that escape the directory', async () => {
    const store = await ResultStore.create(root, 'api', 'escape');
    expect(() => store.artifactPath('../elsewhere.txt')).toThrow(
      expect.objectContaining({ code: HarnessErrorCode.INVALID_STATE })
    );
  });

  it('writes a summary whose passed flag matches the outcome', async () => {
    const store = await ResultStore.create(root, 'api', 'summary');
    store.log('something happened');
    await store.save('before.png', Buffer.from('png'));
    await store.save('service.log', 'started');

    const summary = await store.writeSummary(false, 1500, 'status mismatch', 'Expected status 200, got 500');

    const written = JSON.parse(await fs.readFile(path.join(store.dir, SUMMARY_JSON), 'utf-8'));
    expect(written).toEqual({
      test_name: 'summary',
      kind: 'api',
      passed: false,
      skipped: false,
      duration: '1.500s',
      duration_ms: 1500,
      timestamp: summary.timestamp,
      details: 'status mismatch',
      errors: ['Expected status 200, got 500'],
      screenshots: ['before.png'],
      logs: ['service.log', 'test.log'],
    });
    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.errors)).toBe(true);
    expect(Object.isFrozen(summary.screenshots)).toBe(true);
    expect(Object.isFrozen(summary.logs)).toBe(true);
    expect(store.writtenSummary).toBe(summary);
  });

  it('renders SUMMARY.md alongside the JSON', async () => {
    const store = await ResultStore.create(root, 'ui', 'markdown');
    const summary = await store.writeSummary(true, 42, 'all good');

    const md = await fs.readFile(path.join(store.dir, SUMMARY_MD), 'utf-8');
    expect(md).toBe(
      [
        '# Test: markdown',
        '',
        '**Result:** PASS',
        '**Kind:** ui',
        '**Duration:** 42ms',
        `**Timestamp:** ${summary.timestamp}`,
        '',
        '## Screenshots',
        '- None captured',
        '',
        '## Logs',
        '- None captured',
        '',
        '## Details',
        'all good',
        '',
        '## Errors',
        'None',
        '',
      ].join('\n')
    );
  });

  it('fails the summary when required screenshots are missing', async () => {
    const store = await ResultStore.create(root, 'ui', 'screens');
    store.requireScreenshots('before', 'after.png');
    await store.save('before.png', Buffer.from('png'));

    const summary = await store.writeSummary(true, 10, 'clicked');

    expect(summary.passed).toBe(false);
    expect(summary.errors).toEqual(['Missing required screenshots: after']);
  });

  it('writes a skipped summary', async () => {
    const store = await ResultStore.create(root, 'api', 'skipped');
    const summary = await store.writeSkipped('no container engine');
    expect(summary).toMatchObject({ passed: false, skipped: true, details: 'Skipped: no container engine', errors: [] });
    expect(await fs.readFile(path.join(store.dir, SUMMARY_MD), 'utf-8')).toContain('**Result:** SKIP\n');
  });

  it('writes the summary exactly once', async () => {
    const store = await ResultStore.create(root, 'api', 'once');
    await store.writeSummary(true, 1, 'ok');
    expect(store.summaryWritten).toBe(true);
    await expect(store.writeSummary(true, 1, 'again')).rejects.toMatchObject({ code: HarnessErrorCode.INVALID_STATE });
  });
});

describe('sanitizeName', () => {
  it('keeps names to one safe path segment', () => {
    expect(sanitizeName('api/health check')).toBe('api_health_check');
    expect(sanitizeName('../up')).toBe('_up');
    expect(sanitizeName('...')).toBe('unnamed');
  });
});
