export { HarnessError, HarnessErrorCode, isSkippable, errorMessage } from './shared/errors.js';
export { logger, componentLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
export { run, runOrThrow } from './shared/exec.js';
export type { CommandRunner, ExecResult, RunOptions } from './shared/exec.js';
export { waitFor, retry, sleep, deadlineSignal } from './shared/poll.js';
export type { WaitOptions, WaitOutcome } from './shared/poll.js';
export { CleanupSink } from './shared/cleanup.js';
export type { CleanupFailure } from './shared/cleanup.js';
export { scrubJson, parseScrubbed, stripControlSequences } from './shared/json-scrub.js';

export { loadConfig, defaultConfig, findProjectRoot, CONFIG_FILE_NAME } from './config/loader.js';
export type { HarnessConfig, Timeouts, BackendKind } from './config/types.js';
export { buildServiceConfig, renderServiceConfig, writeServiceConfig } from './config/service-config.js';

export { PortAllocator, sharedPortAllocator, probeLoopbackPort } from './ports/allocator.js';
export { ResultStore, sanitizeName } from './results/store.js';
export type { TestKind, TestSummary } from './results/types.js';

export { HttpTestClient, healthStatus, probeHealth } from './http/client.js';
export type { HttpMethod, HttpResult, HttpTestClientOptions, RequestLog } from './http/client.js';
export { SoftAssertions, AssertionFailure } from './http/assertions.js';
export { ProtocolClient, ProtocolCallError, parseFirstEvent } from './protocol/client.js';
export type { StreamEvent } from './protocol/types.js';
export type { ProtocolClientOptions } from './protocol/client.js';

export { ProcessSupervisor } from './process/supervisor.js';
export type { SupervisorState } from './process/supervisor.js';
export { findBinary, buildBinary } from './process/binary.js';

export { DockerCli } from './containers/docker.js';
export type { ContainerSpec, ExecOutput } from './containers/docker.js';
export { ContainerOrchestrator } from './containers/orchestrator.js';
export type { ContainerRole, OrchestratorOptions } from './containers/orchestrator.js';
export { ImageBuilder } from './containers/images.js';
export { DriverClient } from './containers/driver.js';
export type { DriverResponse } from './containers/driver.js';

export { BrowserCapture } from './browser/capture.js';
export type { BrowserCaptureOptions, BrowserLauncher } from './browser/capture.js';

export { TestEnvironment, createTestEnvironment, withTestEnvironment } from './environment/test-environment.js';
export { TestSetup } from './environment/setup.js';
export { selectBackend } from './environment/select.js';
export type { Backend, EnvironmentOptions, EnvironmentState } from './environment/types.js';
