/**
 * Durable checkpoint store.
 *
 * A planning directory holds one small JSON checkpoint recording what cannot be
 * derived from the filesystem: the hash of the requirements document the session
 * started from and when the session was created. Everything else about progress is
 * derived by the state detector.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import { join } from 'node:path';
import { DEFAULT_FILES } from '../config/defaults.js';
import { atomicWrite } from '../utils/atomic-write.js';
import { isErrnoException, safeExists, safeReadFile, safeReadTextFile } from '../utils/safe-fs.js';

/**
 * Persisted session checkpoint.
 */
export interface Checkpoint {
  /** Content hash of the requirements document, formatted `sha256:<hex>`. */
  readonly inputFileHash: string;
  /** ISO 8601 timestamp of checkpoint creation. */
  readonly createdAt: string;
}

/**
 * Error types for checkpoint operations.
 *
 * - `corruption_error`: the file exists but is empty or not valid JSON
 * - `schema_error`: valid JSON missing required fields or holding wrong types
 * - `file_error`: the file could not be read or written
 */
export type CheckpointErrorType = 'corruption_error' | 'schema_error' | 'file_error';

/**
 * Error class for checkpoint operations.
 */
export class CheckpointError extends Error {
  /** The type of checkpoint error. */
  public readonly errorType: CheckpointErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new CheckpointError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of checkpoint error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: CheckpointErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'CheckpointError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Returns the checkpoint path inside a planning directory.
 */
export function checkpointPath(dir: string, stateFile: string = DEFAULT_FILES.state): string {
  return join(dir, stateFile);
}

/**
 * Serializes a checkpoint to its on-disk JSON form.
 */
export function serializeCheckpoint(checkpoint: Checkpoint): string {
  return (
    JSON.stringify(
      { input_file_hash: checkpoint.inputFileHash, created_at: checkpoint.createdAt },
      null,
      2
    ) + '\n'
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses checkpoint JSON, validating required fields.
 *
 * `session_created_at` is accepted in place of `created_at`.
 *
 * @throws CheckpointError with `corruption_error` for unparseable content and
 * `schema_error` for missing or mistyped fields.
 */
export function deserializeCheckpoint(json: string): Checkpoint {
  if (json.trim() === '') {
    throw new CheckpointError('Checkpoint is empty', 'corruption_error', {
      details: 'The file exists but contains no data',
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new CheckpointError(`Invalid JSON: ${parseError.message}`, 'corruption_error', {
      cause: parseError,
    });
  }

  if (!isRecord(data)) {
    throw new CheckpointError('Checkpoint must be a JSON object', 'schema_error');
  }

  const hash = data.input_file_hash;
  if (typeof hash !== 'string' || hash === '') {
    throw new CheckpointError('Missing or invalid field: input_file_hash', 'schema_error');
  }

  const createdAt = data.created_at ?? data.session_created_at;
  if (typeof createdAt !== 'string') {
    throw new CheckpointError('Missing or invalid field: created_at', 'schema_error');
  }

  return { inputFileHash: hash, createdAt };
}

/**
 * Checks whether a planning directory has a checkpoint.
 */
export async function checkpointExists(dir: string, stateFile?: string): Promise<boolean> {
  return safeExists(checkpointPath(dir, stateFile));
}

/**
 * Loads the checkpoint of a planning directory.
 *
 * @returns The checkpoint, or `null` when none exists.
 * @throws CheckpointError when the file is corrupt, malformed or unreadable.
 */
export async function loadCheckpoint(dir: string, stateFile?: string): Promise<Checkpoint | null> {
  const filePath = checkpointPath(dir, stateFile);
  let content: string;

  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    const fileError = error instanceof Error ? error : new Error(String(error));
    throw new CheckpointError(
      `Failed to read checkpoint "${filePath}": ${fileError.message}`,
      'file_error',
      { cause: fileError }
    );
  }

  try {
    return deserializeCheckpoint(content);
  } catch (error) {
    if (error instanceof CheckpointError) {
      throw new CheckpointError(
        `Corrupted checkpoint "${filePath}": ${error.message}`,
        error.errorType,
        { cause: error.cause, details: error.details }
      );
    }
    throw error;
  }
}

/**
 * Atomically writes a checkpoint.
 *
 * @throws CheckpointError with `file_error` when the write fails; the existing
 * checkpoint, if any, is left untouched.
 */
export async function saveCheckpoint(
  dir: string,
  checkpoint: Checkpoint,
  stateFile?: string
): Promise<void> {
  const filePath = checkpointPath(dir, stateFile);
  try {
    await atomicWrite(filePath, serializeCheckpoint(checkpoint));
  } catch (error) {
    const fileError = error instanceof Error ? error : new Error(String(error));
    throw new CheckpointError(
      `Failed to save checkpoint to "${filePath}": ${fileError.message}`,
      'file_error',
      { cause: fileError, details: 'Check that the directory exists and is writable' }
    );
  }
}

/**
 * Computes the content hash of a file.
 *
 * Depends only on the bytes, never on the path.
 *
 * @returns `sha256:<hex digest>`.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  const content = await safeReadFile(filePath);
  return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}

/**
 * Creates and saves a fresh checkpoint for `inputFile`.
 *
 * @param now - Clock used for `createdAt`.
 */
export async function createCheckpoint(
  dir: string,
  inputFile: string,
  options: { stateFile?: string; now?: () => Date } = {}
): Promise<Checkpoint> {
  const checkpoint: Checkpoint = {
    inputFileHash: await computeFileHash(inputFile),
    createdAt: (options.now ?? ((): Date => new Date()))().toISOString(),
  };
  await saveCheckpoint(dir, checkpoint, options.stateFile);
  return checkpoint;
}

/**
 * Compares the live hash of `inputFile` against the checkpoint.
 *
 * @returns `'unknown'` exactly when no checkpoint exists.
 */
export async function fileChangedSinceCheckpoint(
  dir: string,
  inputFile: string,
  stateFile?: string
): Promise<boolean | 'unknown'> {
  const checkpoint = await loadCheckpoint(dir, stateFile);
  if (checkpoint === null) {
    return 'unknown';
  }
  return (await computeFileHash(inputFile)) !== checkpoint.inputFileHash;
}
