import { spawn, ChildProcess } from 'child_process';
import { logger } from '../../utils/logger';

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** -1 when the process was killed or could not be started. */
  exitCode: number;
  timedOut: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: { input?: string }): Promise<CommandResult>;
}

/**
 * Runs the awg / awg-quick binaries without a shell. Every call is bounded by
 * a timeout and every live child is killed by `shutdown()`.
 */
export class ChildProcessRunner implements CommandRunner {
  private children = new Set<ChildProcess>();
  private closed = false;

  constructor(private timeoutMs: number) {}

  run(command: string, args: string[], options: { input?: string } = {}): Promise<CommandResult> {
    if (this.closed) {
      return Promise.resolve({ stdout: '', stderr: 'command runner is shut down', exitCode: -1, timedOut: false });
    }

    logger.debug('Running command', { command, args: args.join(' ') });

    return new Promise((resolve) => {
      const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      this.children.add(child);

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const timer = setTimeout(() => {
        timedOut = true;
        logger.warn('Command timed out, killing it', { command, args: args.join(' '), timeoutMs: this.timeoutMs });
        child.kill('SIGKILL');
      }, this.timeoutMs);

      const finish = (exitCode: number, extraStderr = ''): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.children.delete(child);
        const errText = Buffer.concat(stderr).toString('utf-8').trim();
        resolve({
          stdout: Buffer.concat(stdout).toString('utf-8').trim(),
          stderr: extraStderr ? [errText, extraStderr].filter(Boolean).join('\n') : errText,
          exitCode,
          timedOut,
        });
      };

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        finish(-1, error.message);
      });

      child.on('close', (code) => {
        finish(code ?? -1, timedOut ? `timed out after ${this.timeoutMs}ms` : '');
      });

      child.stdin?.on('error', (error) => {
        logger.debug('Command stdin closed early', { command, error: error.message });
      });
      if (options.input !== undefined) {
        child.stdin?.write(options.input);
      }
      child.stdin?.end();
    });
  }

  shutdown(): void {
    this.closed = true;
    for (const child of this.children) {
      child.kill('SIGKILL');
    }
    if (this.children.size > 0) {
      logger.info('Killed in-flight external commands', { count: this.children.size });
    }
    this.children.clear();
  }

  activeCount(): number {
    return this.children.size;
  }
}
