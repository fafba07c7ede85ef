/**
 * Host Command Executor
 *
 * Spawns hypervisor CLIs, feature scripts and probe scripts as child
 * processes (argv arrays, no shell) and captures their output.
 */

import { spawn } from 'node:child_process';

import type { Logger } from '../lib/logger.js';
import type { CommandResult, HostCommand } from './types.js';
import { formatCommand, renderCommand, supportsAnsi } from './verbose.js';

/**
 * Error codes for host command failures
 */
export type HostCommandErrorCode =
  | 'NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'TIMEOUT'
  | 'SPAWN_FAILED'
  | 'EXECUTION_FAILED';

/**
 * Error thrown when a host command fails
 */
export class HostCommandError extends Error {
  constructor(
    message: string,
    public readonly code: HostCommandErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly stdout: string,
    public readonly command: HostCommand
  ) {
    super(message);
    this.name = 'HostCommandError';
  }
}

/**
 * Options for a single run
 */
export interface RunOptions {
  /** Timeout in milliseconds (default: the executor's) */
  timeoutMs?: number;
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
}

/**
 * Runs host commands. Exit status 0 resolves; anything else rejects with
 * HostCommandError.
 */
export interface CommandExecutor {
  run(command: HostCommand, options?: RunOptions): Promise<CommandResult>;
}

/**
 * Options for constructing a ProcessExecutor
 */
export interface ProcessExecutorOptions {
  /** Default timeout in milliseconds (default: 300000) */
  timeoutMs?: number;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Classify a failure from stderr content.
 */
export function classifyError(stderr: string): HostCommandErrorCode {
  const lower = stderr.toLowerCase();

  if (
    lower.includes('permission denied') ||
    lower.includes('access denied') ||
    lower.includes('not allowed')
  ) {
    return 'ACCESS_DENIED';
  }

  if (
    lower.includes('does not exist') ||
    lower.includes('no such') ||
    lower.includes('not found')
  ) {
    return 'NOT_FOUND';
  }

  return 'EXECUTION_FAILED';
}

/**
 * Pick the most informative stderr line for an error message.
 */
export function formatErrorMessage(
  command: HostCommand,
  stderr: string,
  exitCode: number | null
): string {
  // eslint-disable-next-line no-control-regex
  const clean = stderr.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
  const lines = clean
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);

  const detail = lines.length > 0 ? lines.slice(-3).join(' | ') : `exited with code ${exitCode}`;
  return `${renderCommand(command)}: ${detail}`;
}

/**
 * Executes commands as real child processes.
 */
export class ProcessExecutor implements CommandExecutor {
  private readonly timeoutMs: number;
  private readonly verbose: boolean;

  constructor(options?: ProcessExecutorOptions) {
    this.timeoutMs = options?.timeoutMs ?? 300_000;
    this.verbose = options?.verbose ?? false;
  }

  async run(command: HostCommand, options: RunOptions = {}): Promise<CommandResult> {
    const timeout = options.timeoutMs ?? this.timeoutMs;

    if (this.verbose) {
      process.stderr.write(formatCommand(command, supportsAnsi()));
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command.program, command.args, {
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timeoutId = setTimeout(() => {
        settled = true;
        child.kill('SIGTERM');
        reject(
          new HostCommandError(
            `${renderCommand(command)}: timed out after ${timeout}ms`,
            'TIMEOUT',
            null,
            stderr,
            stdout,
            command
          )
        );
      }, timeout);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeoutId);
        if (settled) return;
        settled = true;
        reject(
          new HostCommandError(
            `Failed to spawn ${command.program}: ${error.message}`,
            'SPAWN_FAILED',
            null,
            stderr,
            stdout,
            command
          )
        );
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (settled) return;
        settled = true;

        if (code !== 0) {
          reject(
            new HostCommandError(
              formatErrorMessage(command, stderr, code),
              classifyError(stderr),
              code,
              stderr,
              stdout,
              command
            )
          );
          return;
        }

        resolve({ stdout, stderr, exitCode: 0 });
      });
    });
  }
}

/**
 * Logs every command instead of running it. Each run succeeds with empty
 * output.
 */
export class DryRunExecutor implements CommandExecutor {
  /** Commands seen so far, in order */
  readonly commands: HostCommand[] = [];

  constructor(private readonly logger: Logger) {}

  async run(command: HostCommand): Promise<CommandResult> {
    this.commands.push(command);
    this.logger.info(`[dry-run] ${renderCommand(command)}`);
    return { stdout: '', stderr: '', exitCode: 0 };
  }
}
