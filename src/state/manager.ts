/**
 * State Manager
 *
 * File-backed record store: one JSON file per resource under the state
 * directory. Writes are atomic (temp file, then rename) so a crash never
 * leaves a half-written record.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';

import { StateError } from '../core/errors.js';
import { STAGE_ORDER } from '../core/types.js';
import { getRecordPath } from '../lib/paths.js';
import type { ResourceRecord, StateStore } from './types.js';

const RECORD_FILE = /^(\d+)\.json$/;

function isRecord(value: unknown): value is ResourceRecord {
  if (value === null || typeof value !== 'object') return false;
  const candidate = value as Partial<ResourceRecord>;
  const stages: readonly string[] = STAGE_ORDER;
  return (
    candidate.version === 1 &&
    typeof candidate.id === 'number' &&
    (candidate.kind === 'container' || candidate.kind === 'vm') &&
    typeof candidate.stage === 'string' &&
    (candidate.stage === 'failed' || stages.includes(candidate.stage)) &&
    typeof candidate.resumeStage === 'string' &&
    stages.includes(candidate.resumeStage) &&
    typeof candidate.updatedAt === 'string' &&
    typeof candidate.specHash === 'string'
  );
}

/**
 * Manages resource records in a state directory.
 */
export class StateManager implements StateStore {
  constructor(private readonly stateDir: string) {}

  /**
   * Get the state directory path.
   */
  getStateDir(): string {
    return this.stateDir;
  }

  /**
   * Load one record from disk.
   *
   * @throws StateError if the record exists but is not valid JSON or not a record
   */
  async get(id: number): Promise<ResourceRecord | null> {
    const recordPath = getRecordPath(this.stateDir, id);
    let content: string;
    try {
      content = await readFile(recordPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StateError(
        `State record for ${id} is not valid JSON: ${(error as Error).message}`,
        'STATE_CORRUPTED',
        `Inspect or delete ${recordPath}; the resource restarts from inspection.`,
        recordPath
      );
    }

    if (!isRecord(parsed) || parsed.id !== id) {
      throw new StateError(
        `State record for ${id} has an unexpected shape`,
        'STATE_CORRUPTED',
        `Inspect or delete ${recordPath}; the resource restarts from inspection.`,
        recordPath
      );
    }
    return parsed;
  }

  /**
   * Save a record using atomic write.
   */
  async put(record: ResourceRecord): Promise<void> {
    await mkdir(this.stateDir, { recursive: true });

    const recordPath = getRecordPath(this.stateDir, record.id);
    const tempPath = `${recordPath}.tmp`;
    await writeFile(tempPath, JSON.stringify(record, null, 2), 'utf-8');
    await rename(tempPath, recordPath);
  }

  async remove(id: number): Promise<void> {
    try {
      await unlink(getRecordPath(this.stateDir, id));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }

  async list(): Promise<ResourceRecord[]> {
    let entries: string[];
    try {
      entries = await readdir(this.stateDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const ids = entries
      .map((entry) => RECORD_FILE.exec(entry)?.[1])
      .filter((match): match is string => match !== undefined)
      .map(Number)
      .sort((a, b) => a - b);

    const records: ResourceRecord[] = [];
    for (const id of ids) {
      const record = await this.get(id);
      if (record) records.push(record);
    }
    return records;
  }
}
