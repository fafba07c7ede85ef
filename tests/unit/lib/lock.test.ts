/**
 * Unit tests for the host lock
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { randomUUID } from 'node:crypto';
import { access, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { LockError } from '../../../src/core/errors.js';
import { acquireHostLock } from '../../../src/lib/lock.js';

describe('acquireHostLock', () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `guestsmith-test-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
    lockPath = join(tempDir, 'state', '.lock');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should create the lock file with this process id', async () => {
    const handle = await acquireHostLock(lockPath, 'up');

    const content = JSON.parse(await readFile(lockPath, 'utf-8')) as { pid: number; command: string };
    assert.strictEqual(content.pid, process.pid);
    assert.strictEqual(content.command, 'up');
    assert.strictEqual(handle.lockPath, lockPath);

    await handle.release();
  });

  it('should remove the lock file on release', async () => {
    const handle = await acquireHostLock(lockPath);
    await handle.release();

    await assert.rejects(access(lockPath));
  });

  it('should tolerate a second release', async () => {
    const handle = await acquireHostLock(lockPath);
    await handle.release();

    await handle.release();
  });

  it('should refuse a lock held by a live process', async () => {
    const handle = await acquireHostLock(lockPath);

    await assert.rejects(
      async () => acquireHostLock(lockPath),
      (error: unknown) => {
        assert.ok(error instanceof LockError);
        assert.strictEqual(error.code, 'LOCK_HELD');
        assert.strictEqual(error.holderPid, process.pid);
        return true;
      }
    );

    await handle.release();
  });

  it('should take over a lock left by a dead process', async () => {
    await mkdir(join(tempDir, 'state'), { recursive: true });
    // Pids are capped well below this value on Linux
    await writeFile(lockPath, JSON.stringify({ pid: 2 ** 30, startedAt: '2026-01-01T00:00:00.000Z' }));

    const handle = await acquireHostLock(lockPath);

    const content = JSON.parse(await readFile(lockPath, 'utf-8')) as { pid: number };
    assert.strictEqual(content.pid, process.pid);
    await handle.release();
  });

  it('should take over an unreadable lock file', async () => {
    await mkdir(join(tempDir, 'state'), { recursive: true });
    await writeFile(lockPath, 'not json');

    const handle = await acquireHostLock(lockPath);
    await handle.release();
  });
});
