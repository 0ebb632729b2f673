import { HarnessError, HarnessErrorCode } from '../../shared/errors.js';
import { ContainerOrchestrator } from '../../containers/orchestrator.js';
import type { ContainerRole } from '../../containers/orchestrator.js';
import type { ExecOutput } from '../../containers/docker.js';
import { DriverClient } from '../../containers/driver.js';
import { imageBuilderFor } from '../../containers/images.js';
import type { CommandRunner } from '../../shared/exec.js';
import type { RequestLog } from '../../http/client.js';
import type { HarnessConfig } from '../../config/types.js';
import type { Backend } from '../types.js';

export interface ContainerizedBackendOptions {
  runner?: CommandRunner;
  artifactsDir: string;
  requestLog: RequestLog;
  env?: NodeJS.ProcessEnv;
  runId?: string;
}

/** Service and driver containers on a private network. */
export class ContainerizedBackend implements Backend {
  readonly kind = 'containerized' as const;
  private current: ContainerOrchestrator | null = null;

  constructor(
    private readonly config: HarnessConfig,
    private readonly options: ContainerizedBackendOptions
  ) {}

  get orchestrator(): ContainerOrchestrator {
    if (!this.current) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, 'Containerized backend not started');
    }
    return this.current;
  }

  get baseUrl(): string {
    return this.orchestrator.hostBaseUrl;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.current) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, 'Containerized backend already started');
    }
    const orchestrator = new ContainerOrchestrator(this.config, { ...this.options, signal });
    this.current = orchestrator;
    try {
      await orchestrator.setUp();
      await imageBuilderFor(this.config).ensureBuilt(orchestrator.dockerCli);
      await orchestrator.startPrimary();
      await orchestrator.startDriver();
    } catch (err) {
      // Release whatever was created before the failure.
      await orchestrator.tearDown();
      throw err;
    }
  }

  async stop(): Promise<void> {
    await this.current?.tearDown();
  }

  exec(role: ContainerRole, argv: string[]): Promise<ExecOutput> {
    return this.orchestrator.exec(role, argv);
  }

  driver(): DriverClient {
    return new DriverClient(this.orchestrator, {
      timeoutMs: this.config.timeouts.requestMs,
      healthPath: this.config.service.healthPath,
    });
  }
}
