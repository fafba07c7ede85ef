/**
 * Configuration Loader
 *
 * Loads YAML or JSON configuration documents from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: 'not-found' | 'unreadable' | 'syntax',
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Load and parse a configuration document.
 *
 * JSON is a subset of YAML, so both formats go through the same parser.
 *
 * @param filePath - Path to the document
 * @returns Parsed content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadConfigDocument(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(
        `Configuration file not found: ${filePath}`,
        filePath,
        'not-found',
        err
      );
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        filePath,
        'unreadable',
        err
      );
    }
    throw new ConfigLoadError(
      `Failed to read configuration file: ${filePath}`,
      filePath,
      'unreadable',
      err
    );
  }

  try {
    return yaml.load(content, { filename: filePath });
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(
      `Invalid syntax in ${filePath}: ${err.message}`,
      filePath,
      'syntax',
      err
    );
  }
}
