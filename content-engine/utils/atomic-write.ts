import { randomBytes } from 'crypto';
import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { retryHelper } from '../../server/resilience/retry-policies.js';
import { hasErrorCode } from './errors.js';

/**
 * Write through a sibling temp file and rename it over the target, so readers
 * see either the old content or the new content
 */
export async function writeFileAtomic(targetPath: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(targetPath), { recursive: true });
  const tempPath = `${targetPath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

  try {
    await writeFile(tempPath, data);
    // Windows and network shares report EBUSY/EPERM while a reader holds the target
    const renamed = await retryHelper.retryFileOperation(() => rename(tempPath, targetPath), 'atomic-rename');
    if (!renamed.success) {
      throw renamed.error ?? new Error(`Could not replace ${targetPath}`);
    }
  } catch (error) {
    await unlink(tempPath).catch(cleanupError => {
      if (!isNotFound(cleanupError)) throw cleanupError;
    });
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}
