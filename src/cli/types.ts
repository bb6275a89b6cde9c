/**
 * CLI types and interfaces for the splitplan CLI.
 */

import type { EnvRecord } from '../config/env.js';
import type { Config, SessionEnvironment } from '../config/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Process streams used by the CLI.
 */
export interface CliIO {
  /**
   * Writes to standard output.
   */
  stdout: (text: string) => void;

  /**
   * Writes to standard error.
   */
  stderr: (text: string) => void;

  /**
   * Reads standard input to the end.
   */
  readStdin: () => Promise<string>;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Arguments following the command name.
   */
  args: string[];

  /**
   * Working directory; relative paths resolve against it.
   */
  cwd: string;

  /**
   * Process environment.
   */
  env: EnvRecord;

  /**
   * Effective configuration.
   */
  config: Config;

  /**
   * Host identity variables.
   */
  sessionEnv: SessionEnvironment;

  logger: Logger;

  io: CliIO;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
