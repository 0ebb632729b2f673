import type { BackendKind, HarnessConfig } from '../config/types.js';
import type { ContainerRole } from '../containers/orchestrator.js';
import type { ExecOutput } from '../containers/docker.js';
import type { PortAllocator } from '../ports/allocator.js';
import type { TestKind } from '../results/types.js';
import type { CommandRunner } from '../shared/exec.js';

/** How the service under test is provided. Callers depend only on this. */
export interface Backend {
  readonly kind: BackendKind;
  readonly baseUrl: string;
  start(signal?: AbortSignal): Promise<void>;
  stop(): Promise<void>;
  // Containerized only.
  exec?(role: ContainerRole, argv: string[]): Promise<ExecOutput>;
}

export type EnvironmentState = 'created' | 'started' | 'stopped';

export interface EnvironmentOptions {
  name: string;
  kind: TestKind;
  // Requested backend; an external base URL in the config still wins.
  backend?: BackendKind;
  config?: HarnessConfig;
  allocator?: PortAllocator;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  // Bounds provisioning, e.g. a suite deadline.
  signal?: AbortSignal;
}
