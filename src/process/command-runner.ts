import { spawn } from 'node:child_process';
import { logger } from '../observability/logger.js';

const KILL_GRACE_MS = 5_000;
const OUTPUT_TAIL_CHARS = 500;

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly signal: NodeJS.Signals | null = null
  ) {
    const tail = stderr.trim().slice(-OUTPUT_TAIL_CHARS);
    const how = signal ? `was killed by ${signal}` : `exited with code ${exitCode}`;
    super(`${command} ${how}${tail ? `: ${tail}` : ''}`);
    this.name = 'CommandFailedError';
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

/**
 * Spawns without a shell and resolves with captured output on exit code 0.
 * Aborting the signal sends SIGTERM, then SIGKILL after a grace period.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const display = formatCommand(command, args);

  return new Promise<CommandResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(options.signal.reason);
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let killTimer: NodeJS.Timeout | null = null;

    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const onAbort = () => {
      logger.warn('command_abort', 'Aborting running command', { command: display });
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null) child.kill('SIGKILL');
      }, KILL_GRACE_MS);
      killTimer.unref();
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = () => {
      options.signal?.removeEventListener('abort', onAbort);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });

    child.on('close', (code, signal) => {
      cleanup();
      const stdout = Buffer.concat(stdoutChunks).toString('utf-8');
      const stderr = Buffer.concat(stderrChunks).toString('utf-8');

      if (options.signal?.aborted) {
        reject(options.signal.reason);
        return;
      }
      if (code !== 0) {
        reject(new CommandFailedError(display, code, stderr, signal));
        return;
      }
      resolve({ exitCode: 0, stdout, stderr });
    });
  });
};
