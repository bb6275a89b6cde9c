/**
 * Status command handler for the splitplan CLI.
 *
 * Reports the session state of a planning directory without writing anything:
 * whether a checkpoint exists, which artifacts are present, and the step the next
 * setup would resume at.
 */

import { resolve } from 'node:path';
import {
  CheckpointError,
  fileChangedSinceCheckpoint,
  loadCheckpoint,
} from '../../session/checkpoint.js';
import { WORKFLOW_STEPS, detectState } from '../../session/detector.js';
import { validateInputFile } from '../../session/setup.js';
import { validatePlanningDir } from '../../session/split-dirs.js';
import { toFailureOutput } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { parseArgs, requirePositional } from '../utils/args.js';
import { writeJson } from '../utils/errorHandling.js';

/**
 * Handles `splitplan status <planning-dir> [--file <path>]`.
 *
 * With `--file`, also reports whether that input changed since the checkpoint.
 */
export async function handleStatusCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, { values: ['file'] });
  const planningDir = resolve(context.cwd, requirePositional(parsed, 'planning-dir'));
  const { files } = context.config;

  const fileArg = parsed.values.get('file');
  const inputFile = fileArg === undefined ? undefined : resolve(context.cwd, fileArg);

  const validationError =
    (await validatePlanningDir(planningDir)) ??
    (inputFile === undefined ? null : await validateInputFile(inputFile));
  if (validationError !== null) {
    writeJson(context.io, toFailureOutput('validation_error', validationError));
    return { exitCode: 1 };
  }

  let checkpoint;
  try {
    checkpoint = await loadCheckpoint(planningDir, files.state);
  } catch (error) {
    if (error instanceof CheckpointError) {
      writeJson(context.io, toFailureOutput('corrupted_state', error.message));
      return { exitCode: 1 };
    }
    throw error;
  }

  const state = await detectState(planningDir, files);

  writeJson(context.io, {
    success: true,
    planningDir,
    hasCheckpoint: checkpoint !== null,
    sessionCreatedAt: checkpoint?.createdAt ?? null,
    ...(inputFile !== undefined
      ? {
          inputChanged: await fileChangedSinceCheckpoint(planningDir, inputFile, files.state),
        }
      : {}),
    state,
    resumeFromStep: state.resumeStep,
    resumeStepName: WORKFLOW_STEPS[state.resumeStep],
  });
  return { exitCode: 0 };
}
