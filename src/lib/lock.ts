/**
 * Host Lock
 *
 * At most one invocation may mutate a state directory at a time. The lock is
 * a file created with O_CREAT | O_EXCL holding the owner's pid; a lock whose
 * pid is no longer alive is stale and taken over.
 */

import { mkdir, open, readFile, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';

import { LockError } from '../core/errors.js';

/**
 * Handle returned by acquireHostLock
 */
export interface LockHandle {
  lockPath: string;
  release(): Promise<void>;
}

interface LockContent {
  pid: number;
  startedAt: string;
  command?: string;
}

function isAlive(pid: number): boolean {
  try {
    // Signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}

async function readHolder(lockPath: string): Promise<number | undefined> {
  try {
    const parsed = JSON.parse(await readFile(lockPath, 'utf-8')) as Partial<LockContent>;
    return typeof parsed.pid === 'number' ? parsed.pid : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Acquire the host lock, failing immediately if a live process holds it.
 *
 * @param lockPath - Lock file path
 * @param command - Command name recorded in the lock for diagnosis
 * @throws LockError if the lock is held
 */
export async function acquireHostLock(
  lockPath: string,
  command?: string
): Promise<LockHandle> {
  await mkdir(dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const handle = await open(lockPath, 'wx');
      const content: LockContent = {
        pid: process.pid,
        startedAt: new Date().toISOString(),
        command,
      };
      await handle.writeFile(JSON.stringify(content, null, 2), 'utf-8');
      await handle.close();

      return {
        lockPath,
        release: async () => {
          await unlink(lockPath).catch((error: NodeJS.ErrnoException) => {
            if (error.code !== 'ENOENT') throw error;
          });
        },
      };
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
        throw error;
      }

      const holder = await readHolder(lockPath);
      if (holder !== undefined && isAlive(holder)) {
        throw new LockError(lockPath, holder);
      }

      // Stale lock: remove and try once more
      await unlink(lockPath).catch((unlinkError: NodeJS.ErrnoException) => {
        if (unlinkError.code !== 'ENOENT') throw unlinkError;
      });
    }
  }

  throw new LockError(lockPath);
}
