/**
 * Project Lock Manager
 * Refuses a second generation run against a project while one is still in flight.
 * File-based so that several server processes sharing a data directory see the same locks.
 */

import { writeFile, readFile, unlink, mkdir, readdir } from 'fs/promises';
import { join } from 'path';
import { createHash } from 'crypto';
import { hostname } from 'os';
import { z } from 'zod';
import { pathFor } from '../../config/paths.js';
import { isNotFound } from '../../content-engine/utils/atomic-write.js';
import { JobKind } from '../../content-engine/jobs/src/types.js';
import { errorMessage, hasErrorCode } from '../../content-engine/utils/errors.js';
import { Logger, silentLogger } from '../../content-engine/utils/logger.js';

export interface LockConfig {
  defaultTtl: number; // milliseconds
  lockDir: string;
}

const LockInfoSchema = z.object({
  lockId: z.string(),
  kind: z.enum(['teaching_plan', 'lesson_plan', 'copyright']),
  projectId: z.string(),
  ownerId: z.string(),
  acquiredAt: z.number(),
  expiresAt: z.number(),
  metadata: z
    .object({
      userId: z.string().optional(),
      jobId: z.string().optional()
    })
    .optional()
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface AcquireLockResult {
  acquired: boolean;
  lockInfo?: LockInfo;
  existingLock?: LockInfo;
  error?: string;
}

export const DEFAULT_LOCK_CONFIG: LockConfig = {
  defaultTtl: 2 * 60 * 60 * 1000, // 2 hours
  lockDir: pathFor('LOCKS_DIR')
};

/**
 * One lock per (job kind, project). An expired lock is taken over on the next acquire.
 */
export class ProjectLockManager {
  private config: LockConfig;
  private ownerId: string;
  private logger: Logger;

  constructor(config: Partial<LockConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_LOCK_CONFIG, ...config };
    this.ownerId = this.generateOwnerId();
    this.logger = logger || silentLogger;
  }

  async initialize(): Promise<void> {
    await mkdir(this.config.lockDir, { recursive: true });
  }

  /**
   * Take the lock for `kind` on `projectId`, or report the lock that holds it
   */
  async acquireLock(
    kind: JobKind,
    projectId: string,
    metadata?: LockInfo['metadata'],
    ttl: number = this.config.defaultTtl
  ): Promise<AcquireLockResult> {
    const lockId = this.generateLockId(kind, projectId);
    const lockPath = this.getLockPath(lockId);
    const now = Date.now();

    const lockInfo: LockInfo = {
      lockId,
      kind,
      projectId,
      ownerId: this.ownerId,
      acquiredAt: now,
      expiresAt: now + ttl,
      metadata
    };

    try {
      await this.initialize();
      if (await this.writeLockFile(lockPath, lockInfo)) {
        return { acquired: true, lockInfo };
      }

      const existingLock = await this.readLockFile(lockPath);
      if (existingLock && !this.isLockExpired(existingLock)) {
        return { acquired: false, existingLock };
      }

      // Expired or unreadable: take it over once
      this.logger('warn', 'Replacing stale lock', { kind, projectId, previousOwner: existingLock?.ownerId });
      await this.removeLockFile(lockPath);
      if (await this.writeLockFile(lockPath, lockInfo)) {
        return { acquired: true, lockInfo };
      }

      const winner = await this.readLockFile(lockPath);
      return { acquired: false, existingLock: winner ?? undefined };
    } catch (error) {
      return { acquired: false, error: errorMessage(error) };
    }
  }

  /**
   * Release a lock this instance holds; false when it is gone or owned elsewhere
   */
  async releaseLock(lockId: string): Promise<boolean> {
    const lockPath = this.getLockPath(lockId);
    const existingLock = await this.readLockFile(lockPath);
    if (!existingLock || existingLock.ownerId !== this.ownerId) {
      return false;
    }

    await this.removeLockFile(lockPath);
    return true;
  }

  async isLocked(kind: JobKind, projectId: string): Promise<{ locked: boolean; lockInfo?: LockInfo }> {
    const lockInfo = await this.readLockFile(this.getLockPath(this.generateLockId(kind, projectId)));
    if (!lockInfo || this.isLockExpired(lockInfo)) {
      return { locked: false };
    }
    return { locked: true, lockInfo };
  }

  /**
   * Unexpired locks, for the health endpoint
   */
  async getActiveLocks(): Promise<LockInfo[]> {
    const locks: LockInfo[] = [];
    for (const file of await this.lockFiles()) {
      const lockInfo = await this.readLockFile(join(this.config.lockDir, file));
      if (lockInfo && !this.isLockExpired(lockInfo)) {
        locks.push(lockInfo);
      }
    }
    return locks;
  }

  /**
   * Remove expired and unreadable lock files. Run once at startup.
   */
  async cleanup(): Promise<{ removed: number }> {
    let removed = 0;

    for (const file of await this.lockFiles()) {
      const lockPath = join(this.config.lockDir, file);
      const lockInfo = await this.readLockFile(lockPath);

      if (!lockInfo || this.isLockExpired(lockInfo)) {
        await this.removeLockFile(lockPath);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger('info', 'Removed stale locks', { removed });
    }
    return { removed };
  }

  private async lockFiles(): Promise<string[]> {
    try {
      const files = await readdir(this.config.lockDir);
      return files.filter(file => file.endsWith('.lock'));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  private async readLockFile(lockPath: string): Promise<LockInfo | null> {
    let data: string;
    try {
      data = await readFile(lockPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    try {
      const parsed = LockInfoSchema.safeParse(JSON.parse(data));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.logger('warn', 'Unreadable lock file', { lockPath, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Exclusive create; false when the file already exists
   */
  private async writeLockFile(lockPath: string, lockInfo: LockInfo): Promise<boolean> {
    try {
      await writeFile(lockPath, JSON.stringify(lockInfo, null, 2), { flag: 'wx' });
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) return false;
      throw error;
    }
  }

  private async removeLockFile(lockPath: string): Promise<void> {
    try {
      await unlink(lockPath);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  private isLockExpired(lockInfo: LockInfo): boolean {
    return Date.now() > lockInfo.expiresAt;
  }

  generateLockId(kind: JobKind, projectId: string): string {
    return createHash('sha256').update(`${kind}:${projectId}`).digest('hex');
  }

  private getLockPath(lockId: string): string {
    return join(this.config.lockDir, `${lockId}.lock`);
  }

  private generateOwnerId(): string {
    const random = Math.random().toString(36).substring(2);
    return createHash('md5').update(`${hostname()}:${process.pid}:${Date.now()}:${random}`).digest('hex');
  }
}
