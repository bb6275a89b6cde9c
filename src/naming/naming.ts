/**
 * Split directory naming.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import { getSplitIndex, listSplitDirs } from '../session/detector.js';
import { safeExists } from '../utils/safe-fs.js';

/**
 * Maximum length of the name part, excluding the index prefix.
 */
export const MAX_NAME_LENGTH = 50;

/**
 * Highest collision suffix tried by {@link generateUniqueName}.
 */
export const MAX_SUFFIX = 99;

/**
 * Error types for naming operations.
 *
 * - `invalid_index`: index outside 1..99
 * - `empty_name`: nothing left after sanitization
 * - `exhausted`: every suffixed candidate is taken
 */
export type NamingErrorType = 'invalid_index' | 'empty_name' | 'exhausted';

/**
 * Error class for naming operations.
 */
export class NamingError extends Error {
  /** The type of naming error. */
  public readonly errorType: NamingErrorType;

  constructor(message: string, errorType: NamingErrorType) {
    super(message);
    this.name = 'NamingError';
    this.errorType = errorType;
  }
}

/**
 * Converts free text to strict kebab-case.
 *
 * @example
 * ```typescript
 * toKebabCase('  API Gateway_v2!! '); // "api-gateway-v2"
 * ```
 */
export function toKebabCase(name: string): string {
  let result = name
    .toLowerCase()
    .replace(/[ _]/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (result.length > MAX_NAME_LENGTH) {
    result = result.slice(0, MAX_NAME_LENGTH).replace(/-+$/, '');
  }
  return result;
}

/**
 * Formats a split directory name as `NN-kebab-name`.
 *
 * @throws NamingError if the index is outside 1..99 or the name sanitizes to nothing.
 */
export function formatSplitDirName(index: number, name: string): string {
  if (!Number.isInteger(index) || index < 1 || index > 99) {
    throw new NamingError(`Split index must be 1-99, got ${String(index)}`, 'invalid_index');
  }

  const kebab = toKebabCase(name);
  if (kebab === '') {
    throw new NamingError(`Name '${name}' is empty after sanitization`, 'empty_name');
  }

  return `${String(index).padStart(2, '0')}-${kebab}`;
}

/**
 * Next split index: one past the highest existing index, 1 when there are none.
 * Gaps are not filled.
 */
export async function getNextIndex(planningDir: string): Promise<number> {
  const splits = await listSplitDirs(planningDir);
  return splits.reduce((max, split) => Math.max(max, getSplitIndex(split)), 0) + 1;
}

/**
 * Generates a split directory name not yet taken in `planningDir`.
 *
 * Tries `NN-name`, then `NN-name-2` through `NN-name-99`.
 *
 * @throws NamingError when the name is invalid or every candidate exists.
 */
export async function generateUniqueName(
  planningDir: string,
  index: number,
  baseName: string
): Promise<string> {
  const base = formatSplitDirName(index, baseName);
  if (!(await safeExists(join(planningDir, base)))) {
    return base;
  }

  for (let suffix = 2; suffix <= MAX_SUFFIX; suffix++) {
    const candidate = `${base}-${String(suffix)}`;
    if (!(await safeExists(join(planningDir, candidate)))) {
      return candidate;
    }
  }

  throw new NamingError(
    `Cannot generate unique name for index ${String(index)}, name '${baseName}'`,
    'exhausted'
  );
}
