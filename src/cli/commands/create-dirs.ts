/**
 * Create-dirs command handler: creates the split directories listed in the manifest.
 */

import { resolve } from 'node:path';
import { createSplitDirectories } from '../../session/split-dirs.js';
import { toFailureOutput } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { parseArgs, requirePositional } from '../utils/args.js';
import { writeJson } from '../utils/errorHandling.js';

/**
 * Handles `splitplan create-dirs <planning-dir>`.
 */
export async function handleCreateDirsCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, {});
  const planningDir = resolve(context.cwd, requirePositional(parsed, 'planning-dir'));

  const result = await createSplitDirectories(planningDir, context.config.files);
  if (!result.success) {
    writeJson(context.io, toFailureOutput(result.category, result.error, { errors: result.errors }));
    return { exitCode: 1 };
  }

  context.logger.info('split_directories_created', {
    planningDir,
    created: result.created.length,
    skipped: result.skipped.length,
  });
  writeJson(context.io, result);
  return { exitCode: 0 };
}
