import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import execa from 'execa';
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { failureMessage } from '../shared/exec.js';
import { settlesWithin, waitFor } from '../shared/poll.js';
import { healthStatus, probeHealth } from '../http/client.js';
import { writeServiceConfig } from '../config/service-config.js';
import type { Timeouts } from '../config/types.js';

const log = componentLogger('supervisor');

export type SupervisorState = 'not-started' | 'starting' | 'ready' | 'stopping' | 'stopped' | 'failed';

export interface SupervisorOptions {
  binary: string;
  // {config}, {dataDir} and {port} are substituted.
  args: string[];
  port: number;
  dataDir: string;
  configPath: string;
  logPath: string;
  healthPath: string;
  timeouts: Pick<
    Timeouts,
    'readinessMs' | 'shutdownGraceMs' | 'forceKillWaitMs' | 'portReleaseMs' | 'probeRequestMs' | 'pollIntervalMs'
  >;
  serviceConfigOverlay?: string | null;
  // Extra variables for the child, on top of the inherited environment.
  env?: Record<string, string>;
}

interface ExitInfo {
  exitCode?: number;
  signal?: string;
  message?: string;
}

/**
 * Runs the service as a child process: not-started → starting → ready →
 * stopping → stopped, or starting → failed. stop() escalates SIGINT → SIGKILL
 * and then waits until the health endpoint stops answering so the next
 * environment can reuse the port.
 */
export class ProcessSupervisor {
  private child: execa.ExecaChildProcess | null = null;
  private exited: Promise<ExitInfo> | null = null;
  private exitInfo: ExitInfo | null = null;
  private logFile: FileHandle | null = null;
  private _state: SupervisorState = 'not-started';

  constructor(private readonly options: SupervisorOptions) {}

  get state(): SupervisorState {
    return this._state;
  }

  get baseUrl(): string {
    return `http://127.0.0.1:${this.options.port}`;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this._state === 'starting' || this._state === 'ready' || this._state === 'stopping') {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `Service already ${this._state}`, { port: this.options.port });
    }
    this._state = 'starting';
    this.exitInfo = null;
    const { timeouts } = this.options;

    try {
      await writeServiceConfig(
        this.options.configPath,
        {
          host: '127.0.0.1',
          port: this.options.port,
          dataDir: this.options.dataDir,
          shutdownTimeoutSeconds: Math.ceil(timeouts.shutdownGraceMs / 1000),
        },
        this.options.serviceConfigOverlay ?? null
      );
      this.logFile = await fs.open(this.options.logPath, 'a');
    } catch (err) {
      await this.closeLog();
      this._state = 'failed';
      throw new HarnessError(HarnessErrorCode.SETUP_FAILED, 'Failed to prepare service config or log file', {
        configPath: this.options.configPath,
      }, { cause: err });
    }

    this.spawn();
    log.info({ pid: this.child?.pid, port: this.options.port }, 'service process spawned');

    let outcome;
    try {
      outcome = await waitFor(
        async () => this.exitInfo !== null || probeHealth(this.baseUrl, this.options.healthPath, timeouts.probeRequestMs),
        { timeoutMs: timeouts.readinessMs, intervalMs: timeouts.pollIntervalMs, signal }
      );
    } catch (err) {
      // Cancelled: do not leave a half-started process behind.
      await this.terminate();
      this._state = 'failed';
      throw err;
    }

    const exitInfo = this.lastExit();
    if (exitInfo) {
      await this.terminate();
      this._state = 'failed';
      throw new HarnessError(HarnessErrorCode.SETUP_FAILED, `Service exited during startup (${describeExit(exitInfo)})`, {
        logPath: this.options.logPath,
      });
    }
    if (!outcome.ok) {
      await this.terminate();
      this._state = 'failed';
      throw new HarnessError(
        HarnessErrorCode.READINESS_TIMEOUT,
        `Service not healthy after ${outcome.elapsedMs}ms at ${this.baseUrl}${this.options.healthPath}` +
          (outcome.lastError ? ` (last error: ${outcome.lastError})` : ''),
        { elapsedMs: outcome.elapsedMs, lastError: outcome.lastError, logPath: this.options.logPath }
      );
    }

    this._state = 'ready';
    log.info({ port: this.options.port, elapsedMs: outcome.elapsedMs }, 'service ready');
  }

  async stop(): Promise<void> {
    if (this._state === 'not-started' || this._state === 'stopped' || this._state === 'stopping') return;
    this._state = 'stopping';
    await this.terminate();
    this._state = 'stopped';
  }

  // Read through a method: the exit handler sets this field asynchronously.
  private lastExit(): ExitInfo | null {
    return this.exitInfo;
  }

  private spawn(): void {
    const { options } = this;
    const substitute = (arg: string) =>
      arg
        .replaceAll('{config}', options.configPath)
        .replaceAll('{dataDir}', options.dataDir)
        .replaceAll('{port}', String(options.port));
    const fd = this.logFile?.fd ?? 'ignore';

    const child = execa(options.binary, options.args.map(substitute), {
      env: {
        SERVICE_CONFIG: options.configPath,
        SERVICE_DATA_DIR: options.dataDir,
        ...options.env,
      },
      stdin: 'ignore',
      stdout: fd,
      stderr: fd,
      reject: false,
      cleanup: true,
    });
    this.child = child;
    this.exited = child.then(result => {
      const info: ExitInfo = {
        exitCode: result.exitCode ?? undefined,
        signal: result.signal ?? undefined,
        message: result.failed && result.exitCode === undefined ? failureMessage(result) : undefined,
      };
      this.exitInfo = info;
      return info;
    });
  }

  // Graceful-then-forced shutdown, then wait for the port to stop answering.
  private async terminate(): Promise<void> {
    const { child, exited } = this;
    const { timeouts } = this.options;
    if (child && exited && this.lastExit() === null) {
      child.kill('SIGINT');
      if (!(await settlesWithin(exited, timeouts.shutdownGraceMs))) {
        log.warn({ pid: child.pid, graceMs: timeouts.shutdownGraceMs }, 'service ignored SIGINT; sending SIGKILL');
        child.kill('SIGKILL');
        if (!(await settlesWithin(exited, timeouts.forceKillWaitMs))) {
          log.error({ pid: child.pid }, 'service did not exit after SIGKILL');
        }
      }
    }
    const release = await waitFor(
      async () => {
        try {
          await healthStatus(this.baseUrl, this.options.healthPath, timeouts.probeRequestMs);
          return false;
        } catch (err) {
          log.debug({ err: errorMessage(err) }, 'health probe refused; port released');
          return true;
        }
      },
      { timeoutMs: timeouts.portReleaseMs, intervalMs: timeouts.pollIntervalMs }
    );
    if (!release.ok) {
      log.warn({ port: this.options.port, waitedMs: release.elapsedMs }, 'port still answering after shutdown');
    }

    await this.closeLog();
    this.child = null;
  }

  private async closeLog(): Promise<void> {
    const file = this.logFile;
    this.logFile = null;
    if (file) {
      try {
        await file.close();
      } catch (err) {
        log.debug({ err: errorMessage(err) }, 'service log already closed');
      }
    }
  }
}

function describeExit(info: ExitInfo): string {
  if (info.message) return info.message;
  if (info.signal) return `signal ${info.signal}`;
  return `exit code ${info.exitCode ?? 'unknown'}`;
}
