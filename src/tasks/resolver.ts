/**
 * Task list identity resolution.
 *
 * Exactly one source supplies the identity per invocation, first available wins:
 *
 * 1. `explicit`: the session id handed over by the capture hook (`--session-id`)
 * 2. `user_configured`: the task list a user pinned with `CLAUDE_CODE_TASK_LIST_ID`
 * 3. `ambient`: `CLAUDE_SESSION_ID`, which may be stale after a session reset
 *
 * @packageDocumentation
 */

import type { SessionEnvironment } from '../config/types.js';
import { isRetired, type TaskRecord } from './types.js';

/**
 * Where a task list id came from.
 */
export type TaskListSource = 'explicit' | 'user_configured' | 'ambient' | 'none';

/**
 * Resolved target of a reconciliation.
 */
export interface TaskListContext {
  readonly taskListId: string | null;
  readonly source: TaskListSource;
  /** True only for the user-configured source: the one place a human picks the target. */
  readonly isUserSpecified: boolean;
  /**
   * Whether the explicit and ambient ids agree; `'unknown'` unless both are present.
   * A mismatch suggests the ambient id is stale.
   */
  readonly idsMatched: boolean | 'unknown';
}

/**
 * Outcome of {@link checkTaskListConflict}.
 */
export type ConflictCheckResult =
  | { readonly conflict: false }
  | {
      readonly conflict: true;
      readonly existingTaskCount: number;
      /** Up to three subjects of live records, by position. */
      readonly sampleSubjects: readonly string[];
    };

/**
 * Read access to existing task records.
 */
export interface TaskRecordReader {
  readTaskRecords(taskListId: string): Promise<TaskRecord[]>;
}

/**
 * Number of sample subjects reported with a conflict.
 */
export const CONFLICT_SAMPLE_SIZE = 3;

function present(value: string | null | undefined): value is string {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Resolves the task list to target. Empty strings count as absent.
 *
 * @param explicitId - Session id passed on the command line, if any.
 * @param sessionEnv - Host identity variables.
 */
export function resolveTaskListContext(
  explicitId: string | null | undefined,
  sessionEnv: SessionEnvironment
): TaskListContext {
  const ambient = sessionEnv.ambientSessionId;
  const userConfigured = sessionEnv.userTaskListId;
  const idsMatched = present(explicitId) && present(ambient) ? explicitId === ambient : 'unknown';

  if (present(explicitId)) {
    return { taskListId: explicitId, source: 'explicit', isUserSpecified: false, idsMatched };
  }
  if (present(userConfigured)) {
    return {
      taskListId: userConfigured,
      source: 'user_configured',
      isUserSpecified: true,
      idsMatched,
    };
  }
  if (present(ambient)) {
    return { taskListId: ambient, source: 'ambient', isUserSpecified: false, idsMatched };
  }
  return { taskListId: null, source: 'none', isUserSpecified: false, idsMatched };
}

/**
 * Checks whether writing to a user-configured list would clobber live tasks.
 *
 * Session-derived identities never conflict: they represent a resume. Retired
 * records do not count.
 *
 * @throws TaskStoreError when an existing record is unreadable.
 */
export async function checkTaskListConflict(
  context: TaskListContext,
  store: TaskRecordReader
): Promise<ConflictCheckResult> {
  if (context.source !== 'user_configured' || context.taskListId === null) {
    return { conflict: false };
  }

  const live = (await store.readTaskRecords(context.taskListId)).filter(
    (record) => !isRetired(record)
  );
  if (live.length === 0) {
    return { conflict: false };
  }

  return {
    conflict: true,
    existingTaskCount: live.length,
    sampleSubjects: live.slice(0, CONFLICT_SAMPLE_SIZE).map((record) => record.subject),
  };
}
