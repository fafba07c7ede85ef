/**
 * Verbose Output Helpers
 *
 * Formats host commands for --verbose CLI output. Used by ProcessExecutor
 * to echo commands to stderr before execution.
 */

import { basename } from 'node:path';

import type { HostCommand } from './types.js';

/**
 * ANSI SGR 90 — bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0 — reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Quote an argument the way a POSIX shell would need it.
 */
export function quoteArg(arg: string): string {
  if (arg !== '' && SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command as a copy-pasteable shell line.
 */
export function renderCommand(command: HostCommand): string {
  return [command.program, ...command.args].map(quoteArg).join(' ');
}

/**
 * Format a command for verbose output.
 *
 * The line is prefixed with the program's base name in brackets, e.g.
 * `[pct] pct start 101`, and optionally wrapped in ANSI gray.
 *
 * @param command - The command about to run
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(command: HostCommand, ansi: boolean): string {
  const plain = `[${basename(command.program)}] ${renderCommand(command)}\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
