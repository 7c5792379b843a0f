import { spawn } from 'child_process';
import { GitCommandException } from '@/core/exceptions';
import { logger } from '@/utils/cli/logger';

const log = logger.scoped('git');

/**
 * Outcome of one git invocation. A non-zero exit is a normal result here;
 * callers decide what it means.
 */
export interface GitResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

/**
 * Runs git commands. Everything that needs git goes through this seam so it can
 * be replaced by an in-process fake.
 */
export interface GitRunner {
  run(args: readonly string[], cwd: string): Promise<GitResult>;
}

export interface ProcessGitRunnerOptions {
  /** Executable to run (default: `git`) */
  binary?: string;
  /** Timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
}

/**
 * GitRunner backed by a child process.
 *
 * Fails with {@link GitCommandException} when git cannot be started or does
 * not finish within the timeout; a git error exit is returned as a result.
 */
export class ProcessGitRunner implements GitRunner {
  private readonly binary: string;
  private readonly timeoutMs: number;

  public static readonly DEFAULT_TIMEOUT_MS = 5000;

  constructor(options: ProcessGitRunnerOptions = {}) {
    this.binary = options.binary ?? 'git';
    this.timeoutMs = options.timeoutMs ?? ProcessGitRunner.DEFAULT_TIMEOUT_MS;
  }

  public run(args: readonly string[], cwd: string): Promise<GitResult> {
    const command = `${this.binary} ${args.join(' ')}`;
    log.debug(`${command} (cwd: ${cwd})`);

    return new Promise((resolve, reject) => {
      const proc = spawn(this.binary, [...args], {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, this.timeoutMs);

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString('utf8');
      });
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString('utf8');
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timeout);
        const message =
          error.code === 'ENOENT'
            ? `${this.binary} not found in PATH`
            : `failed to run ${command}: ${error.message}`;
        reject(new GitCommandException(message, args, error));
      });

      proc.on('close', (code) => {
        clearTimeout(timeout);

        if (timedOut) {
          reject(
            new GitCommandException(`${command} timed out after ${this.timeoutMs}ms`, args)
          );
          return;
        }

        log.debug(`${command} exited with ${code}`);
        resolve({
          success: code === 0,
          stdout,
          stderr,
          exitCode: code,
        });
      });
    });
  }
}
