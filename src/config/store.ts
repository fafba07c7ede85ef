/**
 * Configuration Store
 *
 * Loads, validates and resolves the host configuration once, then answers
 * lookups for every other component. Nothing downstream re-parses files.
 */

import { dirname, resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { expandPath } from '../lib/paths.js';
import { ConfigLoadError, loadConfigDocument } from './loader.js';
import { resolveConfig, type ConfigDocuments } from './resolver.js';
import type { ResolvedConfig, ResolvedSettings, ResourceSpec } from './types.js';
import {
  validateContainersDocument,
  validateHostConfig,
  validateVmsDocument,
  type ValidationError,
  type ValidationResult,
} from './validator.js';

/**
 * Convert a loader failure into a ConfigError with a suggestion.
 */
export function toConfigError(error: ConfigLoadError): ConfigError {
  if (error.reason === 'syntax') {
    return new ConfigError(
      error.message,
      'CONFIG_INVALID_SYNTAX',
      'Fix the YAML/JSON syntax at the reported line.',
      error.filePath
    );
  }
  return new ConfigError(
    error.message,
    'CONFIG_NOT_FOUND',
    'Ensure the configuration file exists and is readable.',
    error.filePath
  );
}

async function loadDocument<T>(
  filePath: string,
  validate: (data: unknown) => ValidationResult<T>,
  label: string
): Promise<T> {
  let raw: unknown;
  try {
    raw = await loadConfigDocument(filePath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw toConfigError(error);
    }
    throw error;
  }

  const result = validate(raw);
  if (!result.valid) {
    throw new ConfigError(
      `${label} failed schema validation: ${filePath}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed fields and run `guestsmith validate` again.',
      filePath,
      result.errors.map((e: ValidationError) => ({ path: e.path, message: e.message }))
    );
  }
  return result.value;
}

/**
 * Read-only view over the resolved configuration.
 */
export class ConfigurationStore {
  private readonly byId: Map<number, ResourceSpec>;

  constructor(private readonly config: ResolvedConfig) {
    this.byId = new Map(config.resources.map((spec) => [spec.id, spec]));
  }

  /**
   * Load the host configuration file and the documents it names.
   *
   * @param configPath - Path to the host configuration file
   * @throws ConfigError on missing files, bad syntax, schema or invariant violations
   */
  static async load(configPath: string): Promise<ConfigurationStore> {
    const absolutePath = resolve(configPath);
    const basePath = dirname(absolutePath);

    const host = await loadDocument(absolutePath, validateHostConfig, 'Host configuration');
    const documents: ConfigDocuments = { host };

    if (host.containers) {
      documents.containers = await loadDocument(
        expandPath(host.containers, basePath),
        validateContainersDocument,
        'Containers document'
      );
    }
    if (host.vms) {
      documents.vms = await loadDocument(
        expandPath(host.vms, basePath),
        validateVmsDocument,
        'VMs document'
      );
    }

    return new ConfigurationStore(await resolveConfig(documents, absolutePath));
  }

  get settings(): ResolvedSettings {
    return this.config.settings;
  }

  get configPath(): string {
    return this.config.configPath;
  }

  get configHash(): string {
    return this.config.configHash;
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  /**
   * Get a resource spec by id.
   *
   * @throws ConfigError if the id is not configured
   */
  get(id: number): ResourceSpec {
    const spec = this.byId.get(id);
    if (!spec) {
      throw new ConfigError(
        `Unknown resource id: ${id}`,
        'UNKNOWN_RESOURCE',
        `Configured ids: ${this.ids().join(', ') || '(none)'}`
      );
    }
    return spec;
  }

  /**
   * All resource specs, ascending by id.
   */
  all(): ResourceSpec[] {
    return this.config.resources;
  }

  ids(): number[] {
    return this.config.resources.map((spec) => spec.id);
  }

  /**
   * Ids that must be converged before `id`: declared dependencies plus the
   * clone source, without duplicates.
   */
  dependenciesOf(id: number): number[] {
    const spec = this.get(id);
    const edges = [...spec.dependencies];
    if (spec.cloneFrom && !edges.includes(spec.cloneFrom.id)) {
      edges.push(spec.cloneFrom.id);
    }
    return edges;
  }
}
