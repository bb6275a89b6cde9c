/**
 * Session setup: the top-level invocation.
 *
 * Validates the requirements document, loads or creates the checkpoint, derives the
 * resume step, resolves the target task list and reconciles the task list with the
 * derived step. Expected failures come back as a {@link SetupFailure}; only faults
 * outside that taxonomy are thrown.
 *
 * @packageDocumentation
 */

import { dirname, extname, resolve } from 'node:path';
import type { Config, SessionEnvironment } from '../config/types.js';
import { buildTaskPlan } from '../tasks/definitions.js';
import {
  checkTaskListConflict,
  resolveTaskListContext,
  type TaskListSource,
} from '../tasks/resolver.js';
import { TaskStore, TaskStoreError } from '../tasks/storage.js';
import type { Logger } from '../utils/logger.js';
import { isErrnoException, safeReadTextFile, safeStat } from '../utils/safe-fs.js';
import {
  CheckpointError,
  computeFileHash,
  createCheckpoint,
  loadCheckpoint,
  type Checkpoint,
} from './checkpoint.js';
import { detectState, type DetectedState, type ResumeStep } from './detector.js';

/**
 * Options for {@link setupSession}.
 */
export interface SetupOptions {
  /** Requirements document; its directory becomes the planning directory. */
  inputFile: string;
  pluginRoot: string;
  /** Session id handed over by the capture hook. */
  sessionId?: string | undefined;
  /** Write to a user-configured task list even when it holds live tasks. */
  force?: boolean | undefined;
}

/**
 * Collaborators of {@link setupSession}.
 */
export interface SetupDeps {
  config: Config;
  sessionEnv: SessionEnvironment;
  logger: Logger;
  /** Task store; defaults to one rooted at `config.paths.tasks_root`. */
  store?: TaskStore;
  /** Clock for new checkpoints. */
  now?: () => Date;
}

/**
 * Categories of expected setup failures.
 */
export type SetupFailureCategory =
  | 'validation_error'
  | 'corrupted_state'
  | 'checkpoint_write_error'
  | 'no_target'
  | 'conflict'
  | 'task_write_error';

/**
 * Expected setup failure.
 */
export type SetupFailure =
  | {
      readonly success: false;
      readonly category: Exclude<SetupFailureCategory, 'conflict'>;
      readonly error: string;
    }
  | {
      readonly success: false;
      readonly category: 'conflict';
      readonly error: string;
      readonly taskListId: string;
      readonly existingTaskCount: number;
      readonly sampleSubjects: readonly string[];
    };

/**
 * Successful setup.
 */
export interface SetupSuccess {
  readonly success: true;
  readonly mode: 'new' | 'resume';
  readonly planningDir: string;
  readonly initialFile: string;
  readonly pluginRoot: string;
  readonly resumeFromStep: ResumeStep;
  readonly state: DetectedState;
  readonly existingSplits: readonly string[];
  readonly warnings: readonly string[];
  readonly taskListId: string;
  readonly taskListSource: TaskListSource;
  readonly idsMatched: boolean | 'unknown';
  readonly tasksWritten: number;
  readonly message: string;
}

export type SetupResult = SetupSuccess | SetupFailure;

function fail(
  category: Exclude<SetupFailureCategory, 'conflict'>,
  error: string
): SetupFailure {
  return { success: false, category, error };
}

/**
 * Checks that the input exists, is a non-blank markdown file and is readable.
 *
 * Permission errors while reading are reported; other unexpected read errors propagate.
 *
 * @returns An error message, or `null` when the file is usable.
 */
export async function validateInputFile(filePath: string): Promise<string | null> {
  let stats;
  try {
    stats = await safeStat(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return `File not found: ${filePath}`;
    }
    throw error;
  }

  if (!stats.isFile()) {
    return `Expected a file, got directory: ${filePath}`;
  }

  const extension = extname(filePath);
  if (extension !== '.md') {
    return `Expected markdown file (.md), got: ${extension === '' ? '(none)' : extension}`;
  }

  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EACCES') {
      return `Cannot read file (permission denied): ${filePath}`;
    }
    throw error;
  }

  if (content.trim() === '') {
    return `File is empty: ${filePath}`;
  }
  return null;
}

/**
 * Sets up or resumes a session for a requirements document and reconciles the
 * task list with the derived workflow step.
 *
 * The filesystem alone decides the resume step, for new and resumed sessions alike.
 */
export async function setupSession(options: SetupOptions, deps: SetupDeps): Promise<SetupResult> {
  const { config, sessionEnv, logger } = deps;

  const validationError = await validateInputFile(options.inputFile);
  if (validationError !== null) {
    logger.warn('input_invalid', { inputFile: options.inputFile, error: validationError });
    return fail('validation_error', validationError);
  }

  const initialFile = resolve(options.inputFile);
  const planningDir = dirname(initialFile);
  const stateFile = config.files.state;

  let checkpoint: Checkpoint | null;
  try {
    checkpoint = await loadCheckpoint(planningDir, stateFile);
  } catch (error) {
    if (error instanceof CheckpointError) {
      logger.error('checkpoint_corrupted', { planningDir, errorType: error.errorType });
      return fail('corrupted_state', error.message);
    }
    throw error;
  }

  const mode = checkpoint === null ? 'new' : 'resume';
  const warnings: string[] = [];

  if (checkpoint === null) {
    try {
      await createCheckpoint(planningDir, initialFile, {
        stateFile,
        ...(deps.now !== undefined ? { now: deps.now } : {}),
      });
    } catch (error) {
      if (error instanceof CheckpointError) {
        logger.error('checkpoint_write_failed', { planningDir, error: error.message });
        return fail('checkpoint_write_error', error.message);
      }
      throw error;
    }
    logger.info('checkpoint_created', { planningDir });
  } else if ((await computeFileHash(initialFile)) !== checkpoint.inputFileHash) {
    warnings.push(`Input file has changed since session started: ${initialFile}`);
    logger.warn('input_changed', { initialFile });
  }

  const state = await detectState(planningDir, config.files);
  logger.debug('state_detected', { planningDir, resumeStep: state.resumeStep });

  const context = resolveTaskListContext(options.sessionId, sessionEnv);
  if (context.taskListId === null) {
    return fail(
      'no_target',
      'No task list id available: pass --session-id, or set CLAUDE_CODE_TASK_LIST_ID or CLAUDE_SESSION_ID'
    );
  }
  if (context.idsMatched === false) {
    logger.warn('session_id_mismatch', { taskListId: context.taskListId });
  }

  const store =
    deps.store ?? new TaskStore({ tasksRoot: config.paths.tasks_root, logger: logger.child('TaskStore') });

  if (context.isUserSpecified && options.force !== true) {
    try {
      const conflict = await checkTaskListConflict(context, store);
      if (conflict.conflict) {
        return {
          success: false,
          category: 'conflict',
          error: `Task list '${context.taskListId}' already holds ${String(conflict.existingTaskCount)} task(s)`,
          taskListId: context.taskListId,
          existingTaskCount: conflict.existingTaskCount,
          sampleSubjects: conflict.sampleSubjects,
        };
      }
    } catch (error) {
      if (error instanceof TaskStoreError) {
        logger.error('task_record_corrupted', { taskListId: context.taskListId });
        return fail('corrupted_state', error.message);
      }
      throw error;
    }
  }

  const { tasks, graph } = buildTaskPlan(state.resumeStep, {
    pluginRoot: options.pluginRoot,
    planningDir,
    initialFile,
  });
  const written = await store.writeTasks(context.taskListId, tasks, graph);
  if (!written.success) {
    return fail('task_write_error', written.error);
  }

  logger.info('session_ready', {
    mode,
    planningDir,
    resumeStep: state.resumeStep,
    taskListId: context.taskListId,
    taskListSource: context.source,
  });

  return {
    success: true,
    mode,
    planningDir,
    initialFile,
    pluginRoot: options.pluginRoot,
    resumeFromStep: state.resumeStep,
    state,
    existingSplits: state.splits,
    warnings,
    taskListId: context.taskListId,
    taskListSource: context.source,
    idsMatched: context.idsMatched,
    tasksWritten: written.tasksWritten,
    message: `${mode === 'new' ? 'Starting new' : 'Resuming'} session in: ${planningDir}`,
  };
}
