/**
 * Unit tests for State Manager
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { StateError } from '../../../src/core/errors.js';
import { StateManager } from '../../../src/state/manager.js';
import type { ResourceRecord } from '../../../src/state/types.js';

function record(id: number, overrides: Partial<ResourceRecord> = {}): ResourceRecord {
  return {
    version: 1,
    id,
    kind: 'container',
    stage: 'configured',
    resumeStage: 'configured',
    updatedAt: '2026-01-01T00:00:00.000Z',
    specHash: 'abcd1234',
    ...overrides,
  };
}

describe('StateManager', () => {
  let tempDir: string;
  let stateDir: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `guestsmith-test-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
    stateDir = join(tempDir, 'state');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('get', () => {
    it('should return null when no record exists', async () => {
      const manager = new StateManager(stateDir);

      assert.strictEqual(await manager.get(101), null);
    });

    it('should read back a stored record', async () => {
      const manager = new StateManager(stateDir);
      await manager.put(record(101));

      assert.deepStrictEqual(await manager.get(101), record(101));
    });

    it('should keep failure details', async () => {
      const manager = new StateManager(stateDir);
      const failed = record(101, {
        stage: 'failed',
        resumeStage: 'running',
        failure: { stage: 'customizing', code: 'FEATURE_FAILED', message: 'nginx failed', at: '2026-01-01T00:01:00.000Z' },
      });
      await manager.put(failed);

      assert.deepStrictEqual(await manager.get(101), failed);
    });

    it('should throw STATE_CORRUPTED for invalid JSON', async () => {
      await mkdir(stateDir, { recursive: true });
      await writeFile(join(stateDir, '101.json'), '{ not json');
      const manager = new StateManager(stateDir);

      await assert.rejects(
        async () => manager.get(101),
        (error: unknown) => {
          assert.ok(error instanceof StateError);
          assert.strictEqual(error.code, 'STATE_CORRUPTED');
          assert.strictEqual(error.statePath, join(stateDir, '101.json'));
          return true;
        }
      );
    });

    it('should throw STATE_CORRUPTED for an unknown stage', async () => {
      await mkdir(stateDir, { recursive: true });
      await writeFile(join(stateDir, '101.json'), JSON.stringify({ ...record(101), stage: 'halfway' }));
      const manager = new StateManager(stateDir);

      await assert.rejects(
        async () => manager.get(101),
        (error: unknown) => error instanceof StateError && error.message === 'State record for 101 has an unexpected shape'
      );
    });

    it('should reject a record filed under another id', async () => {
      await mkdir(stateDir, { recursive: true });
      await writeFile(join(stateDir, '101.json'), JSON.stringify(record(102)));
      const manager = new StateManager(stateDir);

      await assert.rejects(async () => manager.get(101), StateError);
    });
  });

  describe('put', () => {
    it('should create the state directory', async () => {
      const manager = new StateManager(stateDir);

      await manager.put(record(101));

      assert.deepStrictEqual(await readdir(stateDir), ['101.json']);
    });

    it('should replace an existing record without leaving a temp file', async () => {
      const manager = new StateManager(stateDir);
      await manager.put(record(101));
      await manager.put(record(101, { stage: 'running', resumeStage: 'running' }));

      assert.deepStrictEqual(await readdir(stateDir), ['101.json']);
      const stored = JSON.parse(await readFile(join(stateDir, '101.json'), 'utf-8')) as ResourceRecord;
      assert.strictEqual(stored.stage, 'running');
    });
  });

  describe('remove', () => {
    it('should delete a record', async () => {
      const manager = new StateManager(stateDir);
      await manager.put(record(101));

      await manager.remove(101);

      assert.strictEqual(await manager.get(101), null);
    });

    it('should ignore a missing record', async () => {
      const manager = new StateManager(stateDir);

      await manager.remove(101);
    });
  });

  describe('list', () => {
    it('should return an empty list when the directory does not exist', async () => {
      assert.deepStrictEqual(await new StateManager(stateDir).list(), []);
    });

    it('should list records by ascending id and skip other files', async () => {
      const manager = new StateManager(stateDir);
      await manager.put(record(300));
      await manager.put(record(20));
      await manager.put(record(101));
      await writeFile(join(stateDir, '.lock'), '{}');
      await writeFile(join(stateDir, 'notes.json'), '{}');

      const records = await manager.list();

      assert.deepStrictEqual(records.map((r) => r.id), [20, 101, 300]);
    });
  });

  it('should expose its directory', () => {
    assert.strictEqual(new StateManager(stateDir).getStateDir(), stateDir);
  });
});
