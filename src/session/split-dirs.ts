/**
 * Creates the split directories listed in the project manifest.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import type { FileNameConfig } from '../config/types.js';
import { DEFAULT_FILES } from '../config/defaults.js';
import { parseManifest } from '../manifest/parser.js';
import { isErrnoException, safeExists, safeMkdir, safeStat } from '../utils/safe-fs.js';

export interface SplitDirsSuccess {
  readonly success: true;
  readonly created: readonly string[];
  readonly skipped: readonly string[];
  readonly manifestSplits: readonly string[];
  readonly message: string;
}

export interface SplitDirsFailure {
  readonly success: false;
  readonly category: 'validation_error' | 'manifest_error';
  readonly error: string;
  readonly errors: readonly string[];
}

export type SplitDirsResult = SplitDirsSuccess | SplitDirsFailure;

function invalid(error: string): SplitDirsFailure {
  return { success: false, category: 'validation_error', error, errors: [error] };
}

/**
 * Checks that the planning directory exists and is a directory.
 *
 * @returns An error message, or `null` when the directory is usable.
 */
export async function validatePlanningDir(planningDir: string): Promise<string | null> {
  let stats;
  try {
    stats = await safeStat(planningDir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return `Planning directory not found: ${planningDir}`;
    }
    throw error;
  }
  return stats.isDirectory() ? null : `Expected directory, got file: ${planningDir}`;
}

/**
 * Creates one directory per manifest split under `planningDir`.
 *
 * Existing directories are left alone and reported as skipped, so re-running is safe.
 */
export async function createSplitDirectories(
  planningDir: string,
  files: Pick<FileNameConfig, 'manifest'> = DEFAULT_FILES
): Promise<SplitDirsResult> {
  const dirError = await validatePlanningDir(planningDir);
  if (dirError !== null) {
    return invalid(dirError);
  }

  const manifest = await parseManifest(join(planningDir, files.manifest));
  if (!manifest.isValid) {
    return {
      success: false,
      category: 'manifest_error',
      error: 'Manifest validation failed',
      errors: manifest.errors,
    };
  }

  const created: string[] = [];
  const skipped: string[] = [];
  for (const split of manifest.splits) {
    const splitPath = join(planningDir, split);
    if (await safeExists(splitPath)) {
      skipped.push(split);
    } else {
      await safeMkdir(splitPath, { recursive: true });
      created.push(split);
    }
  }

  return {
    success: true,
    created,
    skipped,
    manifestSplits: manifest.splits,
    message: `Created ${String(created.length)} directories, skipped ${String(skipped.length)} existing`,
  };
}
