/**
 * Shared error handling utilities for CLI commands.
 *
 * Expected failures are printed as failure documents; anything else reaches
 * this boundary as a fatal error.
 */

import { toFailureOutput } from '../errors.js';
import type { CliCommandResult, CliIO } from '../types.js';
import { UsageError } from './args.js';

/**
 * Writes one JSON document to stdout.
 */
export function writeJson(io: CliIO, document: unknown): void {
  io.stdout(JSON.stringify(document, null, 2) + '\n');
}

/**
 * Runs a command handler and converts what it throws into an exit code.
 *
 * - On success: the result's exit code
 * - On a {@link UsageError}: a `usage_error` document on stdout and 1
 * - On any other error: a fatal line on stderr and 1
 */
export async function withErrorHandling(
  io: CliIO,
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    return result.exitCode;
  } catch (error) {
    if (error instanceof UsageError) {
      writeJson(io, toFailureOutput('usage_error', error.message));
      return 1;
    }
    io.stderr(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
