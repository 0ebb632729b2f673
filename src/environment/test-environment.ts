import fs from 'fs/promises';
import path from 'path';
import { loadConfig } from '../config/loader.js';
import { SERVICE_CONFIG_FILE } from '../config/service-config.js';
import type { BackendKind, HarnessConfig } from '../config/types.js';
import { ResultStore } from '../results/store.js';
import type { TestKind, TestSummary } from '../results/types.js';
import { sharedPortAllocator } from '../ports/allocator.js';
import type { PortAllocator } from '../ports/allocator.js';
import { HttpTestClient } from '../http/client.js';
import { AssertionFailure } from '../http/assertions.js';
import { ProtocolClient } from '../protocol/client.js';
import { BrowserCapture } from '../browser/capture.js';
import type { ContainerRole } from '../containers/orchestrator.js';
import type { ExecOutput } from '../containers/docker.js';
import type { DriverClient } from '../containers/driver.js';
import { HarnessError, HarnessErrorCode, errorMessage, isSkippable } from '../shared/errors.js';
import { CleanupSink } from '../shared/cleanup.js';
import { componentLogger } from '../shared/logger.js';
import { ContainerizedBackend } from './backends/containerized.js';
import { ExternalBackend } from './backends/external.js';
import { LocalBackend } from './backends/local.js';
import { selectBackend } from './select.js';
import type { Backend, EnvironmentOptions, EnvironmentState } from './types.js';

const log = componentLogger('environment');

export const SERVICE_LOG = 'service.log';

const SAMPLE_PROJECT: Record<string, string> = {
  'src/greeting.ts': [
    '// helloWorld prints a greeting message.',
    'export function helloWorld(): void {',
    "  console.log('Hello, World!');",
    '}',
    '',
    '// add adds two numbers together.',
    'export function add(a: number, b: number): number {',
    '  return a + b;',
    '}',
    '',
  ].join('\n'),
  'README.md': '# Sample project\n\nA greeting and an add function, used by indexing tests.\n',
};

/**
 * One isolated run of the service for one test: a fresh results directory,
 * a backend, and the clients a test body drives. State only moves forward:
 * created → started → stopped.
 */
export class TestEnvironment {
  readonly name: string;
  readonly kind: TestKind;
  readonly backend: Backend;
  readonly results: ResultStore;
  readonly configPath: string;
  // Local backend only.
  readonly port: number | null;
  private _state: EnvironmentState = 'created';
  private readonly cleanup = new CleanupSink();
  private protocolClient: ProtocolClient | null = null;

  private constructor(
    readonly config: HarnessConfig,
    results: ResultStore,
    backend: Backend,
    port: number | null,
    private readonly allocator: PortAllocator,
    private readonly signal?: AbortSignal
  ) {
    this.name = results.name;
    this.kind = results.kind;
    this.results = results;
    this.backend = backend;
    this.port = port;
    this.configPath = path.join(results.dataDir, SERVICE_CONFIG_FILE);
  }

  static async create(options: EnvironmentOptions): Promise<TestEnvironment> {
    const config = options.config ?? loadConfig({ env: options.env });
    const kind: BackendKind = selectBackend(config, options.backend);
    const results = await ResultStore.create(config.resultsRoot, options.kind, options.name);
    const allocator =
      options.allocator ?? sharedPortAllocator({ start: config.portRangeStart, probeAttempts: config.portProbeAttempts });

    let backend: Backend;
    let port: number | null = null;
    switch (kind) {
      case 'external':
        backend = new ExternalBackend(config.externalBaseUrl ?? '', config);
        break;
      case 'containerized':
        backend = new ContainerizedBackend(config, {
          runner: options.runner,
          artifactsDir: results.dir,
          requestLog: results,
          env: options.env,
        });
        break;
      case 'local':
        port = await allocator.next();
        backend = new LocalBackend(config, {
          port,
          dataDir: results.dataDir,
          configPath: path.join(results.dataDir, SERVICE_CONFIG_FILE),
          logPath: path.join(results.dir, SERVICE_LOG),
          runner: options.runner,
          env: options.env,
        });
        break;
    }
    const environment = new TestEnvironment(config, results, backend, port, allocator, options.signal);
    results.log('Environment %s (%s) created with %s backend', environment.name, environment.kind, kind);
    return environment;
  }

  get state(): EnvironmentState {
    return this._state;
  }

  get dataDir(): string {
    return this.results.dataDir;
  }

  get resultsDir(): string {
    return this.results.dir;
  }

  get baseUrl(): string {
    return this.backend.baseUrl;
  }

  async start(): Promise<void> {
    if (this._state !== 'created') {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `Environment ${this.name} is ${this._state}; start() needs created`);
    }
    const started = Date.now();
    try {
      await this.backend.start(this.signal);
    } catch (err) {
      this.results.log('Start failed: %s', errorMessage(err));
      await this.stop();
      throw err;
    }
    this._state = 'started';
    this.results.log('Started at %s (%dms)', this.baseUrl, Date.now() - started);
  }

  /** Stops the backend and releases the port. Idempotent. */
  async stop(): Promise<void> {
    if (this._state === 'stopped') return;
    this._state = 'stopped';
    await this.cleanup.run();
    try {
      await this.backend.stop();
    } catch (err) {
      log.warn({ name: this.name, err: errorMessage(err) }, 'backend stop failed');
    }
    if (this.port !== null) this.allocator.release(this.port);
    this.results.log('Stopped');
  }

  log(message: string, ...args: unknown[]): void {
    this.results.log(message, ...args);
  }

  http(): HttpTestClient {
    this.requireStarted('http()');
    return new HttpTestClient(this.baseUrl, this.results, { timeoutMs: this.config.timeouts.requestMs });
  }

  /** The environment's one JSON-RPC client, so request ids never repeat within a test. */
  protocol(): ProtocolClient {
    this.requireStarted('protocol()');
    this.protocolClient ??= new ProtocolClient(this.baseUrl, this.results, {
      timeoutMs: this.config.timeouts.requestMs,
      streamReadMs: this.config.timeouts.sseReadMs,
    });
    return this.protocolClient;
  }

  /** A headless browser bound to this environment's results dir; closed by stop(). */
  async browser(): Promise<BrowserCapture> {
    this.requireStarted('browser()');
    const capture = await BrowserCapture.launch(this.baseUrl, this.results, { timeoutMs: this.config.timeouts.browserMs });
    this.cleanup.add('browser', () => capture.close());
    return capture;
  }

  exec(role: ContainerRole, argv: string[]): Promise<ExecOutput> {
    this.requireStarted('exec()');
    if (!this.backend.exec) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `exec() needs the containerized backend, not ${this.backend.kind}`);
    }
    return this.backend.exec(role, argv);
  }

  driver(): DriverClient {
    this.requireStarted('driver()');
    if (!(this.backend instanceof ContainerizedBackend)) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `driver() needs the containerized backend, not ${this.backend.kind}`);
    }
    return this.backend.driver();
  }

  /** Writes a small sample project under data/test-projects/<name> and returns its path. */
  async createTestProject(name: string, files: Record<string, string> = SAMPLE_PROJECT): Promise<string> {
    const root = path.join(this.dataDir, 'test-projects', name);
    for (const [relative, content] of Object.entries(files)) {
      const target = path.join(root, relative);
      if (path.relative(root, target).startsWith('..')) {
        throw new HarnessError(HarnessErrorCode.INVALID_STATE, `Project file escapes project root: ${relative}`);
      }
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    }
    this.results.log('Created test project %s (%d files)', name, Object.keys(files).length);
    return root;
  }

  writeSummary(passed: boolean, durationMs: number, details: string, ...errors: string[]): Promise<TestSummary> {
    return this.results.writeSummary(passed, durationMs, details, ...errors);
  }

  writeSkipped(reason: string, durationMs = 0): Promise<TestSummary> {
    return this.results.writeSkipped(reason, durationMs);
  }

  private requireStarted(what: string): void {
    if (this._state !== 'started') {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `${what} needs a started environment (state: ${this._state})`);
    }
  }
}

export function createTestEnvironment(options: EnvironmentOptions): Promise<TestEnvironment> {
  return TestEnvironment.create(options);
}

export interface RunOutcome<T> {
  summary: TestSummary;
  value?: T;
}

/**
 * create → start → body → stop, then the summary. The body's return value is
 * its details string (or anything else, recorded as "ok"). Environmental
 * errors produce a skipped summary and resolve; anything else is recorded as a
 * failure and rethrown.
 */
export async function withTestEnvironment<T>(
  options: EnvironmentOptions,
  body: (env: TestEnvironment) => Promise<T>
): Promise<RunOutcome<T>> {
  const environment = await TestEnvironment.create(options);
  const started = Date.now();
  let value: T | undefined;
  let failure: unknown = null;
  try {
    await environment.start();
    value = await body(environment);
  } catch (err) {
    failure = err;
  } finally {
    await environment.stop();
  }

  const elapsed = Date.now() - started;
  const own = environment.results.writtenSummary;
  if (own) {
    if (failure !== null) throw failure;
    return { summary: checkPassed(own), value };
  }
  if (failure !== null && isSkippable(failure)) {
    const summary = await environment.writeSkipped(errorMessage(failure), elapsed);
    return { summary };
  }
  if (failure !== null) {
    const errors = failure instanceof AssertionFailure ? failure.failures : [errorMessage(failure)];
    await environment.writeSummary(false, elapsed, `Failed: ${errorMessage(failure).split('\n')[0]}`, ...errors);
    throw failure;
  }
  const details = typeof value === 'string' ? value : 'ok';
  return { summary: checkPassed(await environment.writeSummary(true, elapsed, details)), value };
}

// A summary can fail on its own, e.g. for missing required screenshots.
function checkPassed(summary: TestSummary): TestSummary {
  if (!summary.passed && !summary.skipped) throw new AssertionFailure(summary.errors);
  return summary;
}
