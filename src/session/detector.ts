/**
 * Workflow state detection.
 *
 * Progress is derived from files in the planning directory, never stored:
 *
 * - interview transcript exists: interview complete, resume at step 2
 * - manifest exists: splits proposed, resume at step 4
 * - `NN-name/` directories exist: splits confirmed, resume at step 6
 * - every split holds its spec file: complete, resume at step 7
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import { DEFAULT_FILES } from '../config/defaults.js';
import type { FileNameConfig } from '../config/types.js';
import { isErrnoException, safeExists, safeReaddir, safeStat } from '../utils/safe-fs.js';

/**
 * Workflow step number.
 */
export type WorkflowStep = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * Steps execution can resume at. Steps 3 and 5 run inline after 2 and 4.
 */
export type ResumeStep = 1 | 2 | 4 | 6 | 7;

/**
 * Workflow step names keyed by step number.
 */
export const WORKFLOW_STEPS: Readonly<Record<WorkflowStep, string>> = {
  0: 'setup',
  1: 'interview',
  2: 'split_analysis',
  3: 'dependency_discovery',
  4: 'user_confirmation',
  5: 'directory_creation',
  6: 'spec_generation',
  7: 'complete',
};

/**
 * Every value {@link detectState} can report as `resumeStep`.
 */
export const RESUMABLE_STEPS: readonly ResumeStep[] = [1, 2, 4, 6, 7];

/**
 * Split directory names: two-digit index, then lowercase kebab-case segments.
 */
export const SPLIT_DIR_PATTERN = /^\d{2}-[a-z0-9]+(?:-[a-z0-9]+)*$/;

/**
 * Checks whether a name is a split directory name.
 */
export function isValidSplitDir(name: string): boolean {
  return SPLIT_DIR_PATTERN.test(name);
}

/**
 * Extracts the numeric index of a split directory name.
 *
 * @example
 * ```typescript
 * getSplitIndex('10-api'); // 10
 * ```
 */
export function getSplitIndex(name: string): number {
  return Number.parseInt(name.slice(0, 2), 10);
}

/**
 * Derived workflow state of a planning directory.
 */
export interface DetectedState {
  readonly interviewComplete: boolean;
  readonly manifestCreated: boolean;
  readonly directoriesCreated: boolean;
  /** Split directory names in ascending numeric index order. */
  readonly splits: readonly string[];
  /** The subset of `splits` holding a spec file, in the same order. */
  readonly splitsWithSpecs: readonly string[];
  readonly resumeStep: ResumeStep;
}

/**
 * Lists split directories of `dir` sorted by numeric index.
 *
 * Symlinks to directories count as directories. Entries with malformed names, plain
 * files with split-like names, and dangling links are skipped.
 */
export async function listSplitDirs(dir: string): Promise<string[]> {
  const entries = await safeReaddir(dir);
  const splits: string[] = [];
  for (const entry of entries) {
    if (!isValidSplitDir(entry.name)) {
      continue;
    }
    const linkedDirectory =
      entry.isSymbolicLink() && (await isLinkedDirectory(join(dir, entry.name)));
    if (entry.isDirectory() || linkedDirectory) {
      splits.push(entry.name);
    }
  }
  return splits.sort((a, b) => getSplitIndex(a) - getSplitIndex(b) || a.localeCompare(b));
}

async function isLinkedDirectory(linkPath: string): Promise<boolean> {
  try {
    return (await safeStat(linkPath)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ELOOP')) {
      return false;
    }
    throw error;
  }
}

/**
 * Decision table for the resume step; first match wins.
 */
function resolveResumeStep(
  interviewComplete: boolean,
  manifestCreated: boolean,
  splits: readonly string[],
  splitsWithSpecs: readonly string[]
): ResumeStep {
  if (splits.length > 0 && splitsWithSpecs.length === splits.length) {
    return 7;
  }
  if (splits.length > 0) {
    return 6;
  }
  if (manifestCreated) {
    return 4;
  }
  if (interviewComplete) {
    return 2;
  }
  return 1;
}

/**
 * Derives the workflow state of a planning directory from its files.
 *
 * @param dir - Planning directory; must exist.
 * @param files - Well-known file names.
 *
 * @example
 * ```typescript
 * const state = await detectState('/work/plan');
 * if (state.resumeStep === 6) {
 *   console.log(`${String(state.splitsWithSpecs.length)}/${String(state.splits.length)} specs written`);
 * }
 * ```
 */
export async function detectState(
  dir: string,
  files: FileNameConfig = DEFAULT_FILES
): Promise<DetectedState> {
  const [interviewComplete, manifestCreated, splits] = await Promise.all([
    safeExists(join(dir, files.interview)),
    safeExists(join(dir, files.manifest)),
    listSplitDirs(dir),
  ]);

  const hasSpec = await Promise.all(splits.map((split) => safeExists(join(dir, split, files.spec))));
  const splitsWithSpecs = splits.filter((_, i) => hasSpec[i] === true);

  return {
    interviewComplete,
    manifestCreated,
    directoriesCreated: splits.length > 0,
    splits,
    splitsWithSpecs,
    resumeStep: resolveResumeStep(interviewComplete, manifestCreated, splits, splitsWithSpecs),
  };
}
