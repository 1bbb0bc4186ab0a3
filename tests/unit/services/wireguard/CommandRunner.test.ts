import { ChildProcessRunner } from '../../../../src/services/wireguard/CommandRunner';

describe('ChildProcessRunner', () => {
  it('should feed stdin and collect trimmed stdout', async () => {
    const runner = new ChildProcessRunner(5000);

    const result = await runner.run(process.execPath, ['-e', 'process.stdin.pipe(process.stdout)'], {
      input: 'hello\n',
    });

    expect(result).toEqual({ stdout: 'hello', stderr: '', exitCode: 0, timedOut: false });
  });

  it('should report the exit code and stderr', async () => {
    const runner = new ChildProcessRunner(5000);

    const result = await runner.run(process.execPath, ['-e', 'console.error("boom"); process.exit(3)']);

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('boom');
  });

  it('should kill a command that runs past the timeout', async () => {
    const runner = new ChildProcessRunner(200);

    const result = await runner.run(process.execPath, ['-e', 'setTimeout(() => {}, 10000)']);

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);
    expect(result.stderr).toBe('timed out after 200ms');
    expect(runner.activeCount()).toBe(0);
  });

  it('should resolve with -1 when the binary does not exist', async () => {
    const runner = new ChildProcessRunner(5000);

    const result = await runner.run('definitely-not-a-real-binary-awg', []);

    expect(result.exitCode).toBe(-1);
    expect(result.stderr).toContain('ENOENT');
  });

  it('should kill in-flight commands and refuse new ones after shutdown', async () => {
    const runner = new ChildProcessRunner(10000);

    const pending = runner.run(process.execPath, ['-e', 'setTimeout(() => {}, 10000)']);
    runner.shutdown();
    const result = await pending;

    expect(result.exitCode).toBe(-1);
    expect(result.timedOut).toBe(false);
    await expect(runner.run(process.execPath, ['-e', ''])).resolves.toMatchObject({
      exitCode: -1,
      stderr: 'command runner is shut down',
    });
  });
});
