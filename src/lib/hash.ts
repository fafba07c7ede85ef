/**
 * Hash Utilities
 *
 * Short SHA256 fingerprints for configuration files and resolved specs.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * Compute a short hash of a file's content.
 *
 * @param filePath - Path to the file to hash
 * @returns First 8 characters of SHA256 hash
 */
export async function computeFileHash(filePath: string): Promise<string> {
  const content = await readFile(filePath, 'utf-8');
  return computeContentHash(content);
}

/**
 * Compute a short hash of string content.
 *
 * @param content - String content to hash
 * @returns First 8 characters of SHA256 hash
 */
export function computeContentHash(content: string): string {
  const hash = createHash('sha256').update(content).digest('hex');
  return hash.slice(0, 8);
}

/**
 * Serialize a value with sorted object keys so equal values hash equally.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Compute the fingerprint of a resolved resource spec.
 */
export function computeSpecHash(spec: unknown): string {
  return computeContentHash(stableStringify(spec));
}
