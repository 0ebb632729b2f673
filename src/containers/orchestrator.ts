// Containerized topology: one bridge network, the service container reachable
// by alias, and a driver container that talks to it only over that network.
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';
import { run } from '../shared/exec.js';
import type { CommandRunner } from '../shared/exec.js';
import { CleanupSink } from '../shared/cleanup.js';
import type { CleanupFailure } from '../shared/cleanup.js';
import { componentLogger } from '../shared/logger.js';
import { waitFor } from '../shared/poll.js';
import { probeHealth } from '../http/client.js';
import type { RequestLog } from '../http/client.js';
import type { HarnessConfig } from '../config/types.js';
import { DockerCli } from './docker.js';
import type { ExecOutput } from './docker.js';

const log = componentLogger('containers');

export type ContainerRole = 'service' | 'driver';

export interface OrchestratorOptions {
  runner?: CommandRunner;
  // Suffix for network and container names; random when omitted.
  runId?: string;
  // Bounds every docker call, typically the suite deadline.
  signal?: AbortSignal;
  requestLog?: RequestLog;
  // Where collected artifacts and container logs are written.
  artifactsDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function expandHome(p: string): string {
  return p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p;
}

export function shellQuote(value: string): string {
  return `'${value.replaceAll("'", `'\\''`)}'`;
}

export class ContainerOrchestrator {
  readonly runId: string;
  readonly networkName: string;
  private readonly docker: DockerCli;
  private readonly cleanup = new CleanupSink();
  private readonly containers = new Map<ContainerRole, string>();
  private hostPort: number | null = null;
  private networkReady = false;

  constructor(
    private readonly config: HarnessConfig,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.runId = options.runId ?? randomUUID().slice(0, 8);
    this.networkName = `testbed-${this.runId}`;
    this.docker = new DockerCli(options.runner ?? run, options.signal);
  }

  /** URL of the service through its published loopback port. */
  get hostBaseUrl(): string {
    if (this.hostPort === null) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, 'Service container not started');
    }
    return `http://127.0.0.1:${this.hostPort}`;
  }

  /** URL of the service as seen from inside the network. */
  get internalBaseUrl(): string {
    return `http://${this.config.containers.serviceAlias}:${this.config.service.internalPort}`;
  }

  get dockerCli(): DockerCli {
    return this.docker;
  }

  async setUp(): Promise<void> {
    if (this.networkReady) return;
    if (!(await this.docker.available())) {
      throw new HarnessError(HarnessErrorCode.ENVIRONMENT_UNAVAILABLE, 'No container engine reachable (docker info failed)');
    }
    await this.docker.createNetwork(this.networkName, this.config.containers.networkDriver);
    this.networkReady = true;
    this.cleanup.add(`network ${this.networkName}`, () => this.docker.removeNetwork(this.networkName));
    this.trace('Created network %s', this.networkName);
  }

  async startPrimary(env: Record<string, string> = {}): Promise<void> {
    const { containers, service, timeouts } = this.config;
    const name = await this.startContainer('service', {
      image: containers.serviceImage,
      alias: containers.serviceAlias,
      env: { ...this.forwardedEnv(), ...env },
      publish: service.internalPort,
    });
    this.hostPort = await this.docker.mappedPort(name, service.internalPort);

    const outcome = await waitFor(
      () => probeHealth(this.hostBaseUrl, service.healthPath, timeouts.probeRequestMs),
      { timeoutMs: timeouts.containerStartupMs, intervalMs: timeouts.pollIntervalMs, signal: this.options.signal }
    );
    if (!outcome.ok) {
      throw new HarnessError(
        HarnessErrorCode.READINESS_TIMEOUT,
        `Service container not healthy after ${outcome.elapsedMs}ms` +
          (outcome.lastError ? ` (last error: ${outcome.lastError})` : ''),
        { elapsedMs: outcome.elapsedMs, lastError: outcome.lastError, container: name }
      );
    }
    this.trace('Service container %s healthy at %s (%dms)', name, this.hostBaseUrl, outcome.elapsedMs);
  }

  async startDriver(env: Record<string, string> = {}): Promise<void> {
    const { containers, timeouts } = this.config;
    const name = await this.startContainer('driver', {
      image: containers.driverImage,
      alias: containers.driverAlias,
      env: { ...this.forwardedEnv(), SERVICE_BASE_URL: this.internalBaseUrl, HOME: containers.driverHome, ...env },
      command: ['tail', '-f', '/dev/null'],
    });

    const outcome = await waitFor(
      async () => {
        const probe = await this.docker.exec(name, ['echo', 'ready']);
        return probe.exitCode === 0 && probe.output.includes('ready');
      },
      { timeoutMs: timeouts.driverStartupMs, intervalMs: timeouts.pollIntervalMs, signal: this.options.signal }
    );
    if (!outcome.ok) {
      throw new HarnessError(HarnessErrorCode.READINESS_TIMEOUT, `Driver container not responsive after ${outcome.elapsedMs}ms`, {
        elapsedMs: outcome.elapsedMs,
        lastError: outcome.lastError,
        container: name,
      });
    }
    this.trace('Driver container %s ready', name);
  }

  async exec(role: ContainerRole, argv: string[], options?: { user?: string; input?: string | Buffer }): Promise<ExecOutput> {
    const result = await this.docker.exec(this.containerFor(role), argv, options);
    this.trace('exec[%s] %s -> %d', role, argv.join(' '), result.exitCode);
    return result;
  }

  execBash(role: ContainerRole, script: string, options?: { user?: string }): Promise<ExecOutput> {
    return this.exec(role, ['bash', '-c', script], options);
  }

  /** Writes `data` to `remotePath` inside the container, creating parent directories. */
  async copyFile(role: ContainerRole, data: string | Buffer, remotePath: string, mode = 0o644): Promise<void> {
    const script = `mkdir -p "$(dirname "$1")" && cat > "$1" && chmod ${mode.toString(8)} "$1"`;
    const result = await this.exec(role, ['sh', '-c', script, 'sh', remotePath], { input: data, user: 'root' });
    if (result.exitCode !== 0) {
      throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `Copy to ${role}:${remotePath} failed`, {
        exitCode: result.exitCode,
        output: result.output,
      });
    }
  }

  async hasCredentials(): Promise<boolean> {
    try {
      await fs.access(expandHome(this.config.containers.credentialsPath));
      return true;
    } catch {
      return false;
    }
  }

  async requireCredentials(): Promise<void> {
    if (!(await this.hasCredentials())) {
      throw new HarnessError(
        HarnessErrorCode.ENVIRONMENT_UNAVAILABLE,
        `No credentials at ${this.config.containers.credentialsPath}`
      );
    }
  }

  /**
   * Copies the host credentials file into the driver's home and hands it to
   * the driver user. Returns false when the host has none.
   */
  async copyCredentials(): Promise<boolean> {
    const { containers } = this.config;
    if (!(await this.hasCredentials())) {
      this.trace('No credentials at %s; skipping copy', containers.credentialsPath);
      return false;
    }
    const data = await fs.readFile(expandHome(containers.credentialsPath));
    const target = path.posix.join(containers.driverHome, containers.credentialsTarget);
    await this.copyFile('driver', data, target, 0o600);

    const topLevel = path.posix.join(containers.driverHome, containers.credentialsTarget.split('/')[0]);
    const owner = `${containers.driverUser}:${containers.driverUser}`;
    const chown = await this.exec('driver', ['chown', '-R', owner, topLevel], { user: 'root' });
    if (chown.exitCode !== 0) {
      throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `chown ${topLevel} failed`, { output: chown.output });
    }
    this.trace('Copied credentials to driver:%s', target);
    return true;
  }

  /** Copies a path out of the driver into the artifacts dir. Best effort. */
  async collectArtifacts(remotePath: string, name: string): Promise<string | null> {
    if (!this.options.artifactsDir || !this.containers.has('driver')) return null;
    const dest = path.join(this.options.artifactsDir, name);
    try {
      await this.docker.copyFrom(this.containerFor('driver'), remotePath, dest);
      this.trace('Collected %s -> %s', remotePath, name);
      return dest;
    } catch (err) {
      this.trace('Could not collect %s: %s', remotePath, errorMessage(err));
      return null;
    }
  }

  /** Removes containers, then the network. Safe to call more than once. */
  async tearDown(): Promise<CleanupFailure[]> {
    const failures = await this.cleanup.run();
    this.containers.clear();
    this.networkReady = false;
    this.hostPort = null;
    return failures;
  }

  private async startContainer(
    role: ContainerRole,
    container: { image: string; alias: string; env: Record<string, string>; publish?: number; command?: string[] }
  ): Promise<string> {
    if (!this.networkReady) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `setUp() must run before starting the ${role} container`);
    }
    if (this.containers.has(role)) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `${role} container already started`);
    }
    const name = `${this.networkName}-${role}`;
    // Registered before run so a container that fails its wait is still removed.
    this.cleanup.add(`container ${name}`, async () => {
      await this.saveContainerLog(role);
      await this.docker.remove(name);
    });
    this.containers.set(role, name);
    await this.docker.run({ name, network: this.networkName, ...container });
    this.trace('Started %s container %s (%s)', role, name, container.image);
    return name;
  }

  private containerFor(role: ContainerRole): string {
    const name = this.containers.get(role);
    if (!name) throw new HarnessError(HarnessErrorCode.INVALID_STATE, `${role} container not started`);
    return name;
  }

  private forwardedEnv(): Record<string, string> {
    const env = this.options.env ?? process.env;
    const forwarded: Record<string, string> = {};
    for (const key of this.config.forwardEnv) {
      const value = env[key];
      if (value) forwarded[key] = value;
    }
    return forwarded;
  }

  private async saveContainerLog(role: ContainerRole): Promise<void> {
    const name = this.containers.get(role);
    if (!name || !this.options.artifactsDir) return;
    try {
      const output = await this.docker.logs(name);
      await fs.writeFile(path.join(this.options.artifactsDir, `${role}-container.log`), output);
    } catch (err) {
      log.debug({ container: name, err: errorMessage(err) }, 'container log not saved');
    }
  }

  private trace(message: string, ...args: unknown[]): void {
    if (this.options.requestLog) this.options.requestLog.log(message, ...args);
    else log.info({ runId: this.runId }, message, ...args);
  }
}
