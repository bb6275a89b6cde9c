/**
 * Task model shared by the task definitions, resolver and store.
 *
 * @packageDocumentation
 */

/**
 * Status of a task record.
 */
export type TaskStatus = 'pending' | 'in_progress' | 'completed';

/**
 * All task statuses.
 */
export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress', 'completed'];

/**
 * Subject given to retired task records.
 */
export const OBSOLETE_SUBJECT = '[obsolete]';

/**
 * A task to be written at a position in a task list.
 */
export interface TaskToWrite {
  /** 1-based position; also the record's file name and id. */
  readonly position: number;
  readonly subject: string;
  readonly status: TaskStatus;
  readonly description: string;
  /** Present-tense label shown while the task is in progress. */
  readonly activeForm: string;
  /** Positions waiting on this task. */
  readonly blocks: readonly string[];
  /** Positions this task waits on. */
  readonly blockedBy: readonly string[];
}

/**
 * On-disk task record.
 */
export interface TaskRecord {
  id: string;
  subject: string;
  description: string;
  activeForm: string;
  status: TaskStatus;
  blocks: string[];
  blockedBy: string[];
}

/**
 * Resolved dependency edges of one position.
 */
export interface DependencyEdges {
  readonly blocks: readonly string[];
  readonly blockedBy: readonly string[];
}

/**
 * Dependency edges keyed by position.
 */
export type DependencyGraph = ReadonlyMap<number, DependencyEdges>;

/**
 * Checks whether a record has been retired.
 */
export function isRetired(record: { subject?: unknown; status?: unknown }): boolean {
  return record.subject === OBSOLETE_SUBJECT && record.status === 'completed';
}

/**
 * Converts a task to its record form, letting graph edges override embedded ones.
 */
export function toTaskRecord(task: TaskToWrite, edges?: DependencyEdges): TaskRecord {
  return {
    id: String(task.position),
    subject: task.subject,
    description: task.description,
    activeForm: task.activeForm,
    status: task.status,
    blocks: [...(edges?.blocks ?? task.blocks)],
    blockedBy: [...(edges?.blockedBy ?? task.blockedBy)],
  };
}
