import { loadConfig } from '../config/loader.js';
import { buildBinary } from '../process/binary.js';
import { DockerCli } from '../containers/docker.js';
import { imageBuilderFor } from '../containers/images.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { CleanupSink } from '../shared/cleanup.js';
import { run } from '../shared/exec.js';
import { deadlineSignal } from '../shared/poll.js';
import { selectBackend } from './select.js';
import { TestEnvironment } from './test-environment.js';
import type { EnvironmentOptions } from './types.js';

/**
 * Suite-scoped environment: build once, provision one environment for every
 * test in the suite, tear it down at the end. Provisioning and everything the
 * environment does afterwards share one suite deadline (timeouts.suiteMs).
 *
 *   const setup = new TestSetup({ name: 'api-suite', kind: 'api' });
 *   beforeAll(() => setup.start());
 *   afterAll(() => setup.cleanup());
 */
export class TestSetup {
  private environment: TestEnvironment | null = null;
  private readonly sink = new CleanupSink();

  constructor(private readonly options: EnvironmentOptions) {}

  async start(): Promise<TestEnvironment> {
    if (this.environment) {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `Suite ${this.options.name} already started`);
    }
    const config = this.options.config ?? loadConfig({ env: this.options.env });
    const signal = deadlineSignal(config.timeouts.suiteMs, this.options.signal);
    const runner = this.options.runner ?? run;

    const kind = selectBackend(config, this.options.backend);
    if (kind === 'local') await buildBinary(config, runner);
    if (kind === 'containerized') await imageBuilderFor(config).ensureBuilt(new DockerCli(runner, signal));

    const environment = await TestEnvironment.create({ ...this.options, config, signal });
    this.environment = environment;
    this.sink.add(`environment ${environment.name}`, () => environment.stop());
    await environment.start();
    return environment;
  }

  env(): TestEnvironment {
    if (!this.environment || this.environment.state !== 'started') {
      throw new HarnessError(HarnessErrorCode.INVALID_STATE, `Suite ${this.options.name} has no running environment`);
    }
    return this.environment;
  }

  /** Stops the suite environment. Safe to call more than once. */
  async cleanup(): Promise<void> {
    await this.sink.run();
  }
}
