/**
 * TOML configuration parser for splitplan.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG, DEFAULT_FILES, DEFAULT_LOGGING, DEFAULT_PATHS } from './defaults.js';
import type { Config, FileNameConfig, LoggingConfig, PathConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows a top-level TOML value to a table.
 *
 * @throws ConfigParseError if the value is present but not a table.
 */
function readSection(value: unknown, section: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string or is blank.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  if (value.trim() === '') {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': must not be empty`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates a bare file name: planning-directory files never live in subdirectories.
 */
function validateFileName(value: unknown, fieldPath: string): string {
  const name = validateString(value, fieldPath);
  if (name.includes('/') || name.includes('\\') || name === '.' || name === '..') {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected a bare file name, got '${name}'`
    );
  }
  return name;
}

function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('tasks_root' in raw) {
    result.tasks_root = validateString(raw.tasks_root, 'paths.tasks_root');
  }

  return result;
}

function parseFiles(raw: Record<string, unknown> | undefined): FileNameConfig {
  const result: FileNameConfig = { ...DEFAULT_FILES };
  if (raw === undefined) {
    return result;
  }

  if ('state' in raw) {
    result.state = validateFileName(raw.state, 'files.state');
  }
  if ('interview' in raw) {
    result.interview = validateFileName(raw.interview, 'files.interview');
  }
  if ('manifest' in raw) {
    result.manifest = validateFileName(raw.manifest, 'files.manifest');
  }
  if ('spec' in raw) {
    result.spec = validateFileName(raw.spec, 'files.spec');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * Unknown sections and keys are ignored.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [paths]
 * tasks_root = "/srv/tasks"
 * `);
 * console.log(config.paths.tasks_root); // "/srv/tasks"
 * console.log(config.files.manifest); // "project-manifest.md"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    paths: parsePaths(readSection(parsed.paths, 'paths')),
    files: parseFiles(readSection(parsed.files, 'files')),
    logging: parseLogging(readSection(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths },
    files: { ...DEFAULT_CONFIG.files },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
