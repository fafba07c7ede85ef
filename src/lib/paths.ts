/**
 * Path Utilities
 *
 * Provides path expansion and resolution for configuration, state and
 * hook directories.
 */

import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~, $VAR or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ and environment variables expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(
    /\$\{?([A-Za-z_][A-Za-z0-9_]*)\}?/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  // Relative paths are relative to the host configuration file
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the default state directory for a host configuration file.
 *
 * @param configPath - Path to the host configuration file
 * @returns Absolute path to .guestsmith/state next to the config file
 */
export function getDefaultStateDir(configPath: string): string {
  return join(dirname(resolve(configPath)), '.guestsmith', 'state');
}

/**
 * Get the record file path for one resource.
 *
 * @param stateDir - State directory
 * @param id - Resource identifier
 */
export function getRecordPath(stateDir: string, id: number): string {
  return join(stateDir, `${id}.json`);
}

/**
 * Get the host lock file path for a state directory.
 */
export function getLockPath(stateDir: string): string {
  return join(stateDir, '.lock');
}

/**
 * Get the directory where resolved configuration is handed to feature scripts.
 */
export function getHandoffDir(stateDir: string): string {
  return join(stateDir, 'handoff');
}
