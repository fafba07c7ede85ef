/**
 * Configuration Validator
 *
 * Validates the host configuration and both resource documents against the
 * JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { ContainersDocument, HostConfig, VmsDocument } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with the typed value or failure with errors
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: ValidationError[] };

// strict mode is off because the health check schema uses if/then without
// restating `type` in each branch
const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);
ajv.addSchema(configSchema);

function compileDefinition<T>(name: string): ValidateFunction<T> {
  return ajv.compile<T>({ $ref: `${configSchema.$id}#/definitions/${name}` });
}

const validateHost = compileDefinition<HostConfig>('hostConfig');
const validateContainers = compileDefinition<ContainersDocument>('containersDocument');
const validateVms = compileDefinition<VmsDocument>('vmsDocument');

function run<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors: ValidationError[] = (validate.errors ?? []).map(
    (error: ErrorObject) => ({
      path: error.instancePath || '/',
      message: error.message ?? 'Unknown validation error',
      params: error.params,
    })
  );
  return { valid: false, errors };
}

/**
 * Validate the host configuration file.
 */
export function validateHostConfig(data: unknown): ValidationResult<HostConfig> {
  return run(validateHost, data);
}

/**
 * Validate a containers document.
 */
export function validateContainersDocument(
  data: unknown
): ValidationResult<ContainersDocument> {
  return run(validateContainers, data);
}

/**
 * Validate a VMs document.
 */
export function validateVmsDocument(data: unknown): ValidationResult<VmsDocument> {
  return run(validateVms, data);
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
