/**
 * Error Types for guestsmith
 *
 * Custom error classes with error codes for structured error handling.
 */

import type { AttemptRecord } from '../lib/retry.js';
import type { LifecycleStage } from './types.js';

/**
 * Error codes for all guestsmith errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_SYNTAX'
  | 'CONFIG_VALIDATION_FAILED'
  | 'CONFIG_INVARIANT_VIOLATED'
  | 'UNKNOWN_RESOURCE'
  | 'DEPENDENCY_CYCLE'
  | 'STATE_CORRUPTED'
  | 'LOCK_HELD'
  | 'DRIVER_ERROR'
  | 'FEATURE_FAILED'
  | 'READINESS_EXHAUSTED'
  | 'HOST_INVARIANT_VIOLATED'
  | 'DEPENDENCY_NOT_READY';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_SYNTAX: 1,
  CONFIG_VALIDATION_FAILED: 1,
  CONFIG_INVARIANT_VIOLATED: 1,
  UNKNOWN_RESOURCE: 1,
  DEPENDENCY_CYCLE: 1,
  STATE_CORRUPTED: 2,
  LOCK_HELD: 2,
  DRIVER_ERROR: 2,
  FEATURE_FAILED: 2,
  READINESS_EXHAUSTED: 2,
  HOST_INVARIANT_VIOLATED: 2,
  DEPENDENCY_NOT_READY: 1,
};

/**
 * Base error class for all guestsmith errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class GuestsmithError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'GuestsmithError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, GuestsmithError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-related issues.
 *
 * Always raised before any side effect runs.
 */
export class ConfigError extends GuestsmithError {
  constructor(
    message: string,
    code:
      | 'CONFIG_NOT_FOUND'
      | 'CONFIG_INVALID_SYNTAX'
      | 'CONFIG_VALIDATION_FAILED'
      | 'CONFIG_INVARIANT_VIOLATED'
      | 'UNKNOWN_RESOURCE',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * A dependency cycle among the requested resources.
 */
export class DependencyCycleError extends GuestsmithError {
  constructor(public readonly cycle: number[]) {
    super(
      `Dependency cycle detected: ${[...cycle, cycle[0]].join(' -> ')}`,
      'DEPENDENCY_CYCLE',
      'Remove one of the dependencies (or clone sources) that close the cycle.'
    );
    this.name = 'DependencyCycleError';
    Object.setPrototypeOf(this, DependencyCycleError.prototype);
  }
}

/**
 * Error for state-related issues.
 */
export class StateError extends GuestsmithError {
  constructor(
    message: string,
    code: 'STATE_CORRUPTED',
    suggestion?: string,
    public readonly statePath?: string
  ) {
    super(message, code, suggestion);
    this.name = 'StateError';
    Object.setPrototypeOf(this, StateError.prototype);
  }
}

/**
 * Another invocation holds the host lock.
 */
export class LockError extends GuestsmithError {
  constructor(
    public readonly lockPath: string,
    public readonly holderPid?: number
  ) {
    super(
      `Another guestsmith invocation holds ${lockPath}${holderPid ? ` (pid ${holderPid})` : ''}`,
      'LOCK_HELD',
      'Wait for the other run to finish, or remove the lock file if that process is gone.'
    );
    this.name = 'LockError';
    Object.setPrototypeOf(this, LockError.prototype);
  }
}

/**
 * Base for failures that happen while converging one resource.
 *
 * Carries the stage being attempted so it can be persisted in the record.
 */
export class ConvergeError extends GuestsmithError {
  public stage: LifecycleStage | undefined;

  constructor(
    message: string,
    code:
      | 'DRIVER_ERROR'
      | 'FEATURE_FAILED'
      | 'READINESS_EXHAUSTED'
      | 'HOST_INVARIANT_VIOLATED'
      | 'DEPENDENCY_NOT_READY',
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'ConvergeError';
    Object.setPrototypeOf(this, ConvergeError.prototype);
  }
}

/**
 * A hypervisor lifecycle operation failed.
 */
export class DriverError extends ConvergeError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly resourceId: number,
    public readonly stderr: string = ''
  ) {
    super(message, 'DRIVER_ERROR');
    this.name = 'DriverError';
    Object.setPrototypeOf(this, DriverError.prototype);
  }
}

/**
 * A feature installer or the application step failed.
 */
export class FeatureError extends ConvergeError {
  constructor(
    message: string,
    public readonly feature: string,
    public readonly output: string = ''
  ) {
    super(message, 'FEATURE_FAILED');
    this.name = 'FeatureError';
    Object.setPrototypeOf(this, FeatureError.prototype);
  }
}

/**
 * The resource came up but never reported ready within its retry budget.
 */
export class ReadinessError extends ConvergeError {
  constructor(
    message: string,
    public readonly check: string,
    public readonly attempts: AttemptRecord[]
  ) {
    super(message, 'READINESS_EXHAUSTED');
    this.name = 'ReadinessError';
    Object.setPrototypeOf(this, ReadinessError.prototype);
  }
}

/**
 * A host-level invariant did not hold after the corrective step.
 *
 * Never retried automatically.
 */
export class HostInvariantError extends ConvergeError {
  constructor(message: string, suggestion?: string) {
    super(message, 'HOST_INVARIANT_VIOLATED', suggestion);
    this.name = 'HostInvariantError';
    Object.setPrototypeOf(this, HostInvariantError.prototype);
  }
}

/**
 * A dependency or clone source has not reached the required stage.
 */
export class DependencyNotReadyError extends ConvergeError {
  constructor(
    public readonly resourceId: number,
    public readonly dependencyId: number,
    public readonly required: LifecycleStage
  ) {
    super(
      `Resource ${resourceId} requires ${dependencyId} to reach '${required}' first`,
      'DEPENDENCY_NOT_READY',
      `Converge ${dependencyId} first, or include it in the same invocation.`
    );
    this.name = 'DependencyNotReadyError';
    Object.setPrototypeOf(this, DependencyNotReadyError.prototype);
  }
}

/**
 * Check if an error is a GuestsmithError.
 */
export function isGuestsmithError(error: unknown): error is GuestsmithError {
  return error instanceof GuestsmithError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isGuestsmithError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}

/**
 * Get a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
