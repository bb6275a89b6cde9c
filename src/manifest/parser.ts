/**
 * Parser for the SPLIT_MANIFEST block of a project manifest.
 *
 * The block lists one split directory name per line:
 *
 * ```markdown
 * <!-- SPLIT_MANIFEST
 * 01-backend
 * 02-frontend
 * END_MANIFEST -->
 * ```
 *
 * @packageDocumentation
 */

import { SPLIT_DIR_PATTERN, getSplitIndex } from '../session/detector.js';
import { isErrnoException, safeReadTextFile } from '../utils/safe-fs.js';

/**
 * Result of parsing a manifest.
 */
export interface ParsedManifest {
  /** Valid split names in manifest order. */
  readonly splits: readonly string[];
  readonly errors: readonly string[];
  /** True when there are no errors. */
  readonly isValid: boolean;
}

const MANIFEST_BLOCK_PATTERN = /<!--\s*SPLIT_MANIFEST\s*\n([\s\S]*?)\nEND_MANIFEST\s*-->/;

function manifestError(message: string): ParsedManifest {
  return { splits: [], errors: [message], isValid: false };
}

function formatIndex(index: number): string {
  return String(index).padStart(2, '0');
}

/**
 * Parses manifest text.
 *
 * Each non-blank line of the block must be a split directory name. Indices must be
 * unique and run 01..N; the ordering check only runs once names and duplicates pass.
 */
export function parseManifestContent(content: string): ParsedManifest {
  const match = MANIFEST_BLOCK_PATTERN.exec(content.replace(/\r\n/g, '\n'));
  if (match === null) {
    return manifestError(
      'No SPLIT_MANIFEST block found. Expected format:\n' +
        '<!-- SPLIT_MANIFEST\n01-name\n02-name\nEND_MANIFEST -->'
    );
  }

  const lines = (match[1] ?? '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');

  if (lines.length === 0) {
    return manifestError('SPLIT_MANIFEST block is empty');
  }

  const splits: string[] = [];
  const errors: string[] = [];

  for (const line of lines) {
    if (SPLIT_DIR_PATTERN.test(line)) {
      splits.push(line);
    } else {
      errors.push(
        `Invalid split name '${line}': must match pattern NN-kebab-case ` +
          '(e.g., 01-backend, 02-api-gateway)'
      );
    }
  }

  const seen = new Set<number>();
  for (const split of splits) {
    const index = getSplitIndex(split);
    if (seen.has(index)) {
      errors.push(`Duplicate index ${formatIndex(index)} in split '${split}'`);
    }
    seen.add(index);
  }

  if (splits.length > 0 && errors.length === 0) {
    const actual = splits.map(getSplitIndex).sort((a, b) => a - b);
    if (actual.some((index, i) => index !== i + 1)) {
      errors.push(
        'Split indices should be sequential starting from 01. ' +
          `Found: ${actual.map(formatIndex).join(', ')}`
      );
    }
  }

  return { splits, errors, isValid: errors.length === 0 };
}

/**
 * Reads and parses a manifest file.
 *
 * A missing file is a single-error result; other read errors propagate.
 */
export async function parseManifest(manifestPath: string): Promise<ParsedManifest> {
  let content: string;
  try {
    content = await safeReadTextFile(manifestPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return manifestError(`Manifest file not found: ${manifestPath}`);
    }
    throw error;
  }
  return parseManifestContent(content);
}
