/**
 * Safe file system utilities with path validation.
 *
 * Every helper here resolves its path(s) through {@link validatePath} before touching
 * the file system, so planning directories, checkpoint files and task-store records
 * are only ever addressed by non-empty absolute paths without null bytes.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * The path must be a non-empty string without null bytes; it is normalized with
 * `path.resolve`, which also collapses any "." or ".." segments.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, contains null bytes, or does not resolve to an absolute path.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a file as raw bytes after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 */
export async function safeReadFile(filePath: string): Promise<Buffer> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath);
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The decoded file contents.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes to a file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The data to write to the file.
 * @param options - Optional encoding or file write options (e.g. `{ flag: 'wx' }`).
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(
  filePath: string,
  data: string | Buffer,
  options?: { encoding?: BufferEncoding; mode?: number; flag?: string } | BufferEncoding
): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, options);
}

/**
 * Appends UTF-8 text to a file after validating the path.
 *
 * @param filePath - The path to the file to append to.
 * @param data - The text to append.
 */
export async function safeAppendFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.appendFile(validatedPath, data, 'utf-8');
}

/**
 * Checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists, false otherwise.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory after validating the path.
 *
 * @param filePath - The path to the directory to create.
 * @param options - Optional recursive mode and mode options.
 * @returns The first directory created when `recursive` is set, otherwise undefined.
 */
export async function safeMkdir(
  filePath: string,
  options?: { recursive?: boolean; mode?: number }
): Promise<string | undefined> {
  const validatedPath = validatePath(filePath);
  return fs.mkdir(validatedPath, options);
}

/**
 * Lists the entries of a directory, with their types, after validating the path.
 *
 * @param filePath - The directory to read.
 * @returns The directory entries.
 * @throws {Error} If the directory cannot be read (not found, not a directory, permission denied).
 */
export async function safeReaddir(filePath: string): Promise<Dirent[]> {
  const validatedPath = validatePath(filePath);
  return fs.readdir(validatedPath, { withFileTypes: true });
}

/**
 * Gets file statistics after validating the path.
 *
 * @param filePath - The path to the file or directory.
 * @returns File statistics.
 */
export async function safeStat(filePath: string): Promise<Stats> {
  const validatedPath = validatePath(filePath);
  return fs.stat(validatedPath);
}

/**
 * Renames a file or directory after validating both paths.
 *
 * On the same file system this is an atomic replacement of `newPath`.
 *
 * @param oldPath - The current path.
 * @param newPath - The new path.
 */
export async function safeRename(oldPath: string, newPath: string): Promise<void> {
  const validatedOldPath = validatePath(oldPath);
  const validatedNewPath = validatePath(newPath);
  return fs.rename(validatedOldPath, validatedNewPath);
}

/**
 * Removes a file or directory after validating the path.
 *
 * @param filePath - The path to remove.
 * @param options - Removal options; `force` ignores a missing path.
 */
export async function safeRm(
  filePath: string,
  options?: { force?: boolean; recursive?: boolean }
): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.rm(validatedPath, options);
}

/**
 * Narrows an unknown thrown value to a Node.js system error carrying a `code`.
 *
 * @param error - The caught value.
 * @returns True when the value is an Error with a string `code` property.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
