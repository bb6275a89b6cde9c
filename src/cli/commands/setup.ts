/**
 * Setup command handler: sets up or resumes a session and reconciles its task list.
 */

import { resolve } from 'node:path';
import { setupSession } from '../../session/setup.js';
import { toFailureOutput } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { parseArgs, rejectPositionals, requireValue } from '../utils/args.js';
import { writeJson } from '../utils/errorHandling.js';

/**
 * Handles `splitplan setup --file <path> --plugin-root <dir> [--session-id <id>] [--force]`.
 *
 * Without `--session-id`, the id captured by the SessionStart hook is used.
 */
export async function handleSetupCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, {
    values: ['file', 'plugin-root', 'session-id'],
    flags: ['force'],
  });
  rejectPositionals(parsed);
  const inputFile = resolve(context.cwd, requireValue(parsed, 'file'));
  const pluginRoot = resolve(context.cwd, requireValue(parsed, 'plugin-root'));

  const result = await setupSession(
    {
      inputFile,
      pluginRoot,
      sessionId: parsed.values.get('session-id') ?? context.sessionEnv.capturedSessionId,
      force: parsed.flags.has('force'),
    },
    {
      config: context.config,
      sessionEnv: context.sessionEnv,
      logger: context.logger.child('SessionSetup'),
    }
  );

  if (!result.success) {
    const details =
      result.category === 'conflict'
        ? {
            taskListId: result.taskListId,
            existingTaskCount: result.existingTaskCount,
            sampleSubjects: result.sampleSubjects,
          }
        : {};
    writeJson(context.io, toFailureOutput(result.category, result.error, details));
    return { exitCode: 1 };
  }

  writeJson(context.io, result);
  return { exitCode: 0 };
}
