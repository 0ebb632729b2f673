import { ProcessSupervisor } from '../../process/supervisor.js';
import { buildBinary, findBinary } from '../../process/binary.js';
import { run } from '../../shared/exec.js';
import type { CommandRunner } from '../../shared/exec.js';
import { HarnessError, HarnessErrorCode } from '../../shared/errors.js';
import type { HarnessConfig } from '../../config/types.js';
import type { Backend } from '../types.js';

export interface LocalBackendOptions {
  port: number;
  dataDir: string;
  configPath: string;
  logPath: string;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

/** The service binary spawned on a leased loopback port. */
export class LocalBackend implements Backend {
  readonly kind = 'local' as const;
  private supervisor: ProcessSupervisor | null = null;

  constructor(
    private readonly config: HarnessConfig,
    private readonly options: LocalBackendOptions
  ) {}

  get baseUrl(): string {
    return `http://127.0.0.1:${this.options.port}`;
  }

  get pid(): number | undefined {
    return this.supervisor?.pid;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.supervisor) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, 'Local backend already started');
    }
    const env = this.options.env ?? process.env;
    await buildBinary(this.config, this.options.runner ?? run);
    const binary = await findBinary(this.config, env);

    const forwarded: Record<string, string> = {};
    for (const key of this.config.forwardEnv) {
      const value = env[key];
      if (value) forwarded[key] = value;
    }

    this.supervisor = new ProcessSupervisor({
      binary,
      args: this.config.service.args,
      port: this.options.port,
      dataDir: this.options.dataDir,
      configPath: this.options.configPath,
      logPath: this.options.logPath,
      healthPath: this.config.service.healthPath,
      timeouts: this.config.timeouts,
      serviceConfigOverlay: this.config.serviceConfigOverlay,
      env: forwarded,
    });
    await this.supervisor.start(signal);
  }

  async stop(): Promise<void> {
    await this.supervisor?.stop();
  }
}
