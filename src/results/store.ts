// Per-test results directory: results/<kind>/<name>/ holding data/, test.log,
// saved artifacts and, last of all, summary.json + SUMMARY.md. Creating a
// store wipes whatever a previous run of the same test left behind.
import fs from 'fs/promises';
import { appendFileSync } from 'fs';
import path from 'path';
import { format } from 'util';
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import { formatDuration, renderSummaryMarkdown } from './summary.js';
import type { TestKind, TestSummary } from './types.js';

export const TEST_LOG = 'test.log';
export const SUMMARY_JSON = 'summary.json';
export const SUMMARY_MD = 'SUMMARY.md';

function clockStamp(d: Date): string {
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

export class ResultStore {
  readonly dir: string;
  readonly dataDir: string;
  readonly kind: TestKind;
  readonly name: string;
  private readonly reporter: Logger;
  private readonly requiredScreenshots = new Set<string>();
  private summary: TestSummary | null = null;

  private constructor(dir: string, kind: TestKind, name: string) {
    this.dir = dir;
    this.dataDir = path.join(dir, 'data');
    this.kind = kind;
    this.name = name;
    this.reporter = componentLogger('results').child({ test: name, kind });
  }

  static resultsDirFor(resultsRoot: string, kind: TestKind, name: string): string {
    return path.join(resultsRoot, kind, sanitizeName(name));
  }

  static async create(resultsRoot: string, kind: TestKind, name: string): Promise<ResultStore> {
    const dir = ResultStore.resultsDirFor(resultsRoot, kind, name);
    try {
      await fs.rm(dir, { recursive: true, force: true });
      await fs.mkdir(path.join(dir, 'data'), { recursive: true });
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.RESULTS_DIR_FAILED, `Failed to create results directory ${dir}`, undefined, {
        cause: err,
      });
    }
    return new ResultStore(dir, kind, name);
  }

  get summaryWritten(): boolean {
    return this.summary !== null;
  }

  get writtenSummary(): TestSummary | null {
    return this.summary;
  }

  log(message: string, ...args: unknown[]): void {
    const text = args.length > 0 ? format(message, ...args) : message;
    try {
      appendFileSync(path.join(this.dir, TEST_LOG), `[${clockStamp(new Date())}] ${text}\n`);
    } catch (err) {
      // Logging must never fail a test.
      this.reporter.warn({ err: errorMessage(err) }, 'could not append to test.log');
    }
    this.reporter.info(text);
  }

  async save(name: string, data: Buffer | string): Promise<string> {
    const target = this.artifactPath(name);
    await fs.writeFile(target, data);
    return target;
  }

  async saveJSON(name: string, value: unknown): Promise<string> {
    return this.save(name, JSON.stringify(value, null, 2));
  }

  artifactPath(name: string): string {
    const target = path.join(this.dir, name);
    if (path.relative(this.dir, target).startsWith('..')) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `Artifact name escapes results directory: ${name}`);
    }
    return target;
  }

  screenshotPath(name: string): string {
    return this.artifactPath(name.endsWith('.png') ? name : `${name}.png`);
  }

  /** Screenshot names (without .png) that writeSummary() must find, or it fails the test. */
  requireScreenshots(...names: string[]): void {
    names.forEach(n => this.requiredScreenshots.add(n.replace(/\.png$/, '')));
  }

  async missingScreenshots(required: string[] = [...this.requiredScreenshots]): Promise<string[]> {
    const present = new Set(await this.listArtifacts('.png'));
    return required.filter(name => !present.has(`${name.replace(/\.png$/, '')}.png`));
  }

  /**
   * Scans the directory for screenshots and logs, then writes summary.json and
   * SUMMARY.md. Must be the last artifact-producing call of a test.
   */
  async writeSummary(passed: boolean, durationMs: number, details: string, ...errors: string[]): Promise<TestSummary> {
    return this.finalize({ passed, skipped: false, durationMs, details, errors });
  }

  async writeSkipped(reason: string, durationMs = 0): Promise<TestSummary> {
    return this.finalize({ passed: false, skipped: true, durationMs, details: `Skipped: ${reason}`, errors: [] });
  }

  private async finalize(input: {
    passed: boolean;
    skipped: boolean;
    durationMs: number;
    details: string;
    errors: string[];
  }): Promise<TestSummary> {
    if (this.summary) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `Summary already written for ${this.name}`);
    }
    const errors = [...input.errors];
    let passed = input.passed;
    if (!input.skipped) {
      const missing = await this.missingScreenshots();
      if (missing.length > 0) {
        errors.push(`Missing required screenshots: ${missing.join(', ')}`);
        passed = false;
      }
    }

    const summary: TestSummary = {
      test_name: this.name,
      kind: this.kind,
      passed,
      skipped: input.skipped,
      duration: formatDuration(input.durationMs),
      duration_ms: input.durationMs,
      timestamp: new Date().toISOString(),
      details: input.details,
      errors: Object.freeze(errors),
      screenshots: Object.freeze(await this.listArtifacts('.png')),
      logs: Object.freeze(await this.listArtifacts('.log')),
    };

    try {
      await fs.writeFile(path.join(this.dir, SUMMARY_JSON), JSON.stringify(summary, null, 2), 'utf-8');
      await fs.writeFile(path.join(this.dir, SUMMARY_MD), renderSummaryMarkdown(summary), 'utf-8');
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.RESULTS_DIR_FAILED, `Failed to write summary for ${this.name}`, undefined, {
        cause: err,
      });
    }
    // Frozen down to its lists: the written summary is final.
    this.summary = Object.freeze(summary);
    this.reporter.info({ passed, skipped: input.skipped, errors: errors.length }, 'summary written');
    return this.summary;
  }

  private async listArtifacts(extension: string): Promise<string[]> {
    const entries = await fs.readdir(this.dir, { withFileTypes: true });
    return entries
      .filter(e => e.isFile() && e.name.endsWith(extension))
      .map(e => e.name)
      .sort();
  }
}

// Test names become directory names; keep them to one path segment.
export function sanitizeName(name: string): string {
  const safe = name.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  return safe || 'unnamed';
}
