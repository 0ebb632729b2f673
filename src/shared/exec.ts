import execa from 'execa';
import { HarnessError, HarnessErrorCode, errorMessage } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  // stdout and stderr interleaved in arrival order
  output: string;
  exitCode: number;
  timedOut: boolean;
  signal?: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  input?: string | Buffer;
  signal?: AbortSignal;
}

// Every external command (docker, build tools) goes through a CommandRunner so
// callers can substitute a fake in tests.
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<ExecResult>;

export const run: CommandRunner = async (command, args, options) => {
  if (options?.signal?.aborted) {
    throw new HarnessError(HarnessErrorCode.CANCELLED, `Cancelled before running: ${command}`);
  }
  let child: execa.ExecaChildProcess;
  try {
    child = execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
      input: options?.input,
      all: true,
      reject: false,
    });
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`, {
      cause: errorMessage(err),
    });
  }

  const onAbort = () => child.kill('SIGKILL');
  options?.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const result = await child;
    if (options?.signal?.aborted) {
      throw new HarnessError(HarnessErrorCode.CANCELLED, `Cancelled while running: ${command}`);
    }
    // execa reports a missing binary as a failed result with no exit code
    if (result.exitCode === undefined && result.failed && !result.timedOut && !result.killed) {
      throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`, {
        cause: failureMessage(result) ?? result.stderr,
      });
    }
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      output: result.all ?? '',
      exitCode: result.exitCode ?? (result.timedOut || result.killed ? 128 : 1),
      timedOut: result.timedOut,
      signal: result.signal ?? undefined,
    };
  } finally {
    options?.signal?.removeEventListener('abort', onAbort);
  }
};

// With reject: false a failed result is an ExecaError at runtime, but execa
// types it as a plain return value.
export function failureMessage(result: object): string | undefined {
  return 'shortMessage' in result && typeof result.shortMessage === 'string' ? result.shortMessage : undefined;
}

export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<ExecResult> {
  const result = await runner(command, args, options);
  if (result.exitCode !== 0) {
    throw new HarnessError(
      HarnessErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${command} ${args.join(' ')}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
        timedOut: result.timedOut,
      }
    );
  }
  return result;
}
