/**
 * Helpers shared by the hypervisor-backed drivers.
 */

import { DriverError } from '../core/errors.js';
import {
  HostCommandError,
  parseStatus,
  type CommandExecutor,
  type CommandResult,
  type GuestStatus,
  type HostCommand,
} from '../hypervisor/index.js';

/**
 * Run a command, converting host failures into DriverError.
 */
export async function runStep(
  executor: CommandExecutor,
  operation: string,
  resourceId: number,
  command: HostCommand,
  timeoutMs?: number
): Promise<CommandResult> {
  try {
    return await executor.run(command, timeoutMs === undefined ? {} : { timeoutMs });
  } catch (error) {
    if (error instanceof HostCommandError) {
      throw new DriverError(
        `${operation} failed for ${resourceId}: ${error.message}`,
        operation,
        resourceId,
        error.stderr
      );
    }
    throw error;
  }
}

/**
 * Read the run status, or null when the resource does not exist.
 *
 * Output without a recognisable status line yields 'unknown'; callers then
 * run the operation instead of assuming it is already satisfied.
 */
export async function readStatus(
  executor: CommandExecutor,
  resourceId: number,
  command: HostCommand
): Promise<GuestStatus | 'unknown' | null> {
  try {
    const result = await executor.run(command);
    return parseStatus(result.stdout) ?? 'unknown';
  } catch (error) {
    if (error instanceof HostCommandError && error.code === 'NOT_FOUND') {
      return null;
    }
    if (error instanceof HostCommandError) {
      throw new DriverError(
        `status failed for ${resourceId}: ${error.message}`,
        'status',
        resourceId,
        error.stderr
      );
    }
    throw error;
  }
}

/**
 * Compare one setting and record drift when it differs.
 */
export function compareSetting(
  drift: string[],
  key: string,
  actual: string | undefined,
  expected: string | undefined
): void {
  if ((actual ?? '') !== (expected ?? '')) {
    drift.push(`${key}: ${actual ?? '(unset)'} -> ${expected ?? '(unset)'}`);
  }
}
