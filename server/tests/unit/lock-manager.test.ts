import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync } from 'fs';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ProjectLockManager } from '../../concurrency/lock-manager.js';

describe('ProjectLockManager', () => {
  let lockDir: string;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'locks-'));
    lockDir = path.join(tempDir, 'locks');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test('refuses a second lock on the same project and kind', async () => {
    const first = new ProjectLockManager({ lockDir });
    const second = new ProjectLockManager({ lockDir });

    const held = await first.acquireLock('copyright', 'p1', { userId: 'teacher-1' });
    const refused = await second.acquireLock('copyright', 'p1');

    expect(held.acquired).toBe(true);
    expect(refused.acquired).toBe(false);
    expect(refused.error).toBeUndefined();
    expect(refused.existingLock).toMatchObject({ kind: 'copyright', projectId: 'p1', metadata: { userId: 'teacher-1' } });
  });

  test('keeps kinds and projects apart', async () => {
    const locks = new ProjectLockManager({ lockDir });

    expect((await locks.acquireLock('copyright', 'p1')).acquired).toBe(true);
    expect((await locks.acquireLock('copyright', 'p2')).acquired).toBe(true);
    expect((await locks.acquireLock('lesson_plan', 'p1')).acquired).toBe(true);
    expect(await locks.getActiveLocks()).toHaveLength(3);
  });

  test('only the owner releases a lock', async () => {
    const owner = new ProjectLockManager({ lockDir });
    const other = new ProjectLockManager({ lockDir });
    const { lockInfo } = await owner.acquireLock('teaching_plan', 'course-1');
    const lockId = lockInfo?.lockId ?? '';

    expect(await other.releaseLock(lockId)).toBe(false);
    expect((await owner.isLocked('teaching_plan', 'course-1')).locked).toBe(true);

    expect(await owner.releaseLock(lockId)).toBe(true);
    expect((await owner.isLocked('teaching_plan', 'course-1')).locked).toBe(false);
    expect(await owner.releaseLock(lockId)).toBe(false);
  });

  test('takes over an expired lock', async () => {
    const crashed = new ProjectLockManager({ lockDir });
    const restarted = new ProjectLockManager({ lockDir });
    await crashed.acquireLock('copyright', 'p1', undefined, -1);

    const result = await restarted.acquireLock('copyright', 'p1');

    expect(result.acquired).toBe(true);
    expect(await restarted.getActiveLocks()).toHaveLength(1);
  });

  test('cleanup removes expired and unreadable lock files', async () => {
    const locks = new ProjectLockManager({ lockDir });
    await locks.acquireLock('copyright', 'stale', undefined, -1);
    await locks.acquireLock('copyright', 'live');
    await writeFile(path.join(lockDir, 'broken.lock'), 'not json');

    expect(await locks.cleanup()).toEqual({ removed: 2 });
    expect(await readdir(lockDir)).toEqual([`${locks.generateLockId('copyright', 'live')}.lock`]);
  });

  test('cleanup and listing tolerate a missing directory', async () => {
    const locks = new ProjectLockManager({ lockDir });

    expect(await locks.cleanup()).toEqual({ removed: 0 });
    expect(await locks.getActiveLocks()).toEqual([]);
    expect(existsSync(lockDir)).toBe(false);
  });
});
