/**
 * Atomic file replacement.
 *
 * Content is written to a uniquely named temporary file beside the destination while
 * an exclusive lock is held on that temporary file, and then renamed over the
 * destination. Readers observe either the previous file or the complete new file.
 *
 * @packageDocumentation
 */

import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { lock } from 'proper-lockfile';
import { safeRename, safeRm, safeWriteFile } from './safe-fs.js';
import { logger as defaultLogger, type Logger } from './logger.js';

/**
 * Number of times acquiring the temp-file lock is retried before giving up.
 */
export const LOCK_RETRIES = 5;

/**
 * Options for {@link atomicWrite}.
 */
export interface AtomicWriteOptions {
  /** Logger used to report cleanup problems. */
  logger?: Logger;
}

/**
 * Builds the temporary path used while writing `filePath`.
 *
 * @param filePath - Destination file.
 * @returns A hidden, unique sibling path ending in `.tmp`.
 */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
}

/**
 * Atomically replaces `filePath` with `content`.
 *
 * On failure the destination is left as it was, the temporary file is removed and
 * the original error is rethrown.
 *
 * @param filePath - Destination file; its directory must exist.
 * @param content - UTF-8 text to write.
 * @param options - Write options.
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const log = options.logger ?? defaultLogger;
  const tempPath = tempPathFor(filePath);
  let release: (() => Promise<void>) | undefined;

  try {
    await safeWriteFile(tempPath, '', { flag: 'wx' });
    release = await lock(tempPath, { retries: LOCK_RETRIES });
    await safeWriteFile(tempPath, content, 'utf-8');
    await release();
    release = undefined;
    await safeRename(tempPath, filePath);
  } catch (error) {
    if (release !== undefined) {
      await release().catch((releaseError: unknown) => {
        log.warn('temp_lock_release_failed', { tempPath, error: String(releaseError) });
      });
    }
    await safeRm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      log.warn('temp_cleanup_failed', { tempPath, error: String(cleanupError) });
    });
    throw error;
  }
}
