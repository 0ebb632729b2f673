// Thin wrapper over the docker CLI. Everything goes through a CommandRunner so
// the orchestrator can be exercised without a daemon.
import { run, runOrThrow } from '../shared/exec.js';
import type { CommandRunner, ExecResult } from '../shared/exec.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';

export interface ContainerSpec {
  name: string;
  image: string;
  network: string;
  alias: string;
  env?: Record<string, string>;
  // Container port to publish on a random loopback host port.
  publish?: number;
  command?: string[];
}

export interface ExecOutput {
  exitCode: number;
  output: string;
}

const GONE = /No such (container|network)|not found/i;

export class DockerCli {
  constructor(
    private readonly runner: CommandRunner = run,
    private readonly signal?: AbortSignal
  ) {}

  async available(): Promise<boolean> {
    try {
      const result = await this.runner('docker', ['info', '--format', '{{.ServerVersion}}'], {
        timeoutMs: 15_000,
        signal: this.signal,
      });
      return result.exitCode === 0;
    } catch (err) {
      // docker binary missing
      if (err instanceof HarnessError && err.code === HarnessErrorCode.COMMAND_FAILED) return false;
      throw err;
    }
  }

  async build(tag: string, dockerfile: string, context: string): Promise<void> {
    await runOrThrow(this.runner, 'docker', ['build', '-t', tag, '-f', dockerfile, context], {
      timeoutMs: 1_800_000,
      signal: this.signal,
    });
  }

  async createNetwork(name: string, driver: string): Promise<void> {
    await runOrThrow(this.runner, 'docker', ['network', 'create', '--driver', driver, name], { signal: this.signal });
  }

  /** Removes a network; one that is already gone counts as removed. */
  async removeNetwork(name: string): Promise<void> {
    const result = await this.runner('docker', ['network', 'rm', name]);
    if (result.exitCode !== 0 && !GONE.test(result.stderr)) {
      throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `docker network rm ${name} failed`, { stderr: result.stderr });
    }
  }

  async run(container: ContainerSpec): Promise<string> {
    const args = ['run', '-d', '--name', container.name, '--network', container.network, '--network-alias', container.alias];
    for (const [key, value] of Object.entries(container.env ?? {})) {
      args.push('-e', `${key}=${value}`);
    }
    if (container.publish !== undefined) args.push('-p', `127.0.0.1::${container.publish}`);
    args.push(container.image, ...(container.command ?? []));
    const result = await runOrThrow(this.runner, 'docker', args, { signal: this.signal });
    return result.stdout.trim();
  }

  /** Host port bound to `containerPort` on loopback. */
  async mappedPort(container: string, containerPort: number): Promise<number> {
    const result = await runOrThrow(this.runner, 'docker', ['port', container, `${containerPort}/tcp`], {
      signal: this.signal,
    });
    for (const line of result.stdout.split('\n')) {
      const match = line.trim().match(/:(\d+)$/);
      if (match) return parseInt(match[1], 10);
    }
    throw new HarnessError(HarnessErrorCode.SETUP_FAILED, `No host port mapped for ${container}:${containerPort}`, {
      output: result.stdout,
    });
  }

  async exec(
    container: string,
    argv: string[],
    options?: { input?: string | Buffer; user?: string; timeoutMs?: number }
  ): Promise<ExecOutput> {
    const args = ['exec'];
    if (options?.input !== undefined) args.push('-i');
    if (options?.user) args.push('-u', options.user);
    args.push(container, ...argv);
    const result: ExecResult = await this.runner('docker', args, {
      input: options?.input,
      timeoutMs: options?.timeoutMs,
      signal: this.signal,
    });
    return { exitCode: result.exitCode, output: result.output };
  }

  async logs(container: string): Promise<string> {
    const result = await this.runner('docker', ['logs', container]);
    return result.output;
  }

  async copyFrom(container: string, remotePath: string, localPath: string): Promise<void> {
    await runOrThrow(this.runner, 'docker', ['cp', `${container}:${remotePath}`, localPath], { signal: this.signal });
  }

  /** Force-removes a container; one that is already gone counts as removed. */
  async remove(container: string): Promise<void> {
    const result = await this.runner('docker', ['rm', '-f', '-v', container]);
    if (result.exitCode !== 0 && !GONE.test(result.stderr)) {
      throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `docker rm ${container} failed`, { stderr: result.stderr });
    }
  }
}
