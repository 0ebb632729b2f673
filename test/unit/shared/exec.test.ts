import { failureMessage, run, runOrThrow } from '../../../src/shared/exec.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';

describe('run', () => {
  it('returns exit code and interleaved output without rejecting', async () => {
    const result = await run(process.execPath, ['-e', 'process.stdout.write("out"); process.exit(4)']);

    expect(result.exitCode).toBe(4);
    expect(result.stdout).toBe('out');
    expect(result.output).toBe('out');
    expect(result.timedOut).toBe(false);
  });

  it('reports a binary that cannot spawn as COMMAND_FAILED with the reason', async () => {
    const err = await run('testbed-no-such-binary', []).catch((e: unknown) => e);

    expect(err).toMatchObject({
      code: HarnessErrorCode.COMMAND_FAILED,
      message: 'Command failed to spawn: testbed-no-such-binary',
      context: { cause: expect.stringContaining('ENOENT') },
    });
  });

  it('refuses to start once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(run(process.execPath, ['-e', ''], { signal: controller.signal })).rejects.toMatchObject({
      code: HarnessErrorCode.CANCELLED,
    });
  });
});

describe('runOrThrow', () => {
  it('raises COMMAND_FAILED on a non-zero exit with the captured stderr', async () => {
    const err = await runOrThrow(run, process.execPath, ['-e', 'process.stderr.write("boom"); process.exit(2)']).catch(
      (e: unknown) => e
    );

    expect(err).toMatchObject({
      code: HarnessErrorCode.COMMAND_FAILED,
      context: { stderr: 'boom', timedOut: false },
    });
  });
});

describe('failureMessage', () => {
  it('reads shortMessage only when present as a string', () => {
    expect(failureMessage({ shortMessage: 'Command failed with ENOENT' })).toBe('Command failed with ENOENT');
    expect(failureMessage({ shortMessage: 3 })).toBeUndefined();
    expect(failureMessage({ exitCode: 0 })).toBeUndefined();
  });
});
