/**
 * File-based task store.
 *
 * Each task list is a directory under the tasks root holding one JSON record per
 * position (`<position>.json`). {@link TaskStore.writeTasks} projects a computed task
 * set onto that directory in one batch and retires records the plan no longer covers.
 *
 * @packageDocumentation
 */

import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { atomicWrite } from '../utils/atomic-write.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { isErrnoException, safeMkdir, safeReadTextFile, safeReaddir } from '../utils/safe-fs.js';
import {
  OBSOLETE_SUBJECT,
  TASK_STATUSES,
  isRetired,
  toTaskRecord,
  type DependencyGraph,
  type TaskRecord,
  type TaskStatus,
  type TaskToWrite,
} from './types.js';

/**
 * Error types for task store reads.
 *
 * - `corruption_error`: a record is not valid JSON or not a task record
 */
export type TaskStoreErrorType = 'corruption_error';

/**
 * Error class for task store reads.
 */
export class TaskStoreError extends Error {
  /** The type of task store error. */
  public readonly errorType: TaskStoreErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: TaskStoreErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'TaskStoreError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Outcome of {@link TaskStore.writeTasks}.
 */
export type TaskWriteResult =
  | {
      readonly success: true;
      readonly taskListId: string;
      readonly tasksWritten: number;
      readonly tasksDir: string;
      /** Positions retired by this run, ascending. */
      readonly retiredPositions: readonly number[];
    }
  | {
      readonly success: false;
      readonly taskListId: string;
      readonly tasksWritten: 0;
      readonly error: string;
    };

/**
 * Options for {@link TaskStore.writeTasks}.
 */
export interface WriteTasksOptions {
  /**
   * Retire existing records above the highest written position.
   * @defaultValue true
   */
  markExtraObsolete?: boolean;
}

/**
 * Options for creating a {@link TaskStore}.
 */
export interface TaskStoreOptions {
  /** Directory holding one subdirectory per task list. */
  tasksRoot: string;
  logger?: Logger;
}

const RECORD_FILE_PATTERN = /^(\d+)\.json$/;

/**
 * A record file as found on disk. Names are not always canonical (`012.json`).
 */
interface RecordFile {
  readonly position: number;
  readonly fileName: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function serializeRecord(record: object): string {
  return JSON.stringify(record, null, 2);
}

/**
 * Validates parsed record JSON.
 *
 * @returns The record, or a message naming what is wrong.
 */
function toTaskRecordShape(data: unknown, position: number): TaskRecord | string {
  if (!isRecord(data)) {
    return 'record is not a JSON object';
  }
  if (typeof data.subject !== 'string') {
    return "missing or invalid field 'subject'";
  }
  if (!isTaskStatus(data.status)) {
    return "missing or invalid field 'status'";
  }
  return {
    id: typeof data.id === 'string' ? data.id : String(position),
    subject: data.subject,
    description: typeof data.description === 'string' ? data.description : '',
    activeForm: typeof data.activeForm === 'string' ? data.activeForm : '',
    status: data.status,
    blocks: isStringArray(data.blocks) ? data.blocks : [],
    blockedBy: isStringArray(data.blockedBy) ? data.blockedBy : [],
  };
}

function describeFsError(error: NodeJS.ErrnoException): string {
  return error.code === 'EACCES' || error.code === 'EPERM'
    ? `Permission denied: ${error.message}`
    : `File system error: ${error.message}`;
}

/**
 * Task lists stored as directories of per-position JSON records.
 *
 * @example
 * ```typescript
 * const store = new TaskStore({ tasksRoot: '/home/dev/.claude/tasks' });
 * const result = await store.writeTasks('session-1', tasks, graph);
 * if (!result.success) console.error(result.error);
 * ```
 */
export class TaskStore {
  private readonly tasksRoot: string;
  private readonly log: Logger;

  constructor(options: TaskStoreOptions) {
    this.tasksRoot = options.tasksRoot;
    this.log = options.logger ?? defaultLogger.child('TaskStore');
  }

  /**
   * Directory holding the records of a task list.
   */
  getTasksDir(taskListId: string): string {
    return join(this.tasksRoot, taskListId);
  }

  /**
   * Lists the record files of a task list by ascending position. A missing list has none.
   */
  private async listRecordFiles(tasksDir: string): Promise<RecordFile[]> {
    let entries: Dirent[];
    try {
      entries = await safeReaddir(tasksDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const files: RecordFile[] = [];
    for (const entry of entries) {
      const match = RECORD_FILE_PATTERN.exec(entry.name);
      if (entry.isFile() && match?.[1] !== undefined) {
        files.push({ position: Number(match[1]), fileName: entry.name });
      }
    }
    return files.sort((a, b) => a.position - b.position || a.fileName.localeCompare(b.fileName));
  }

  /**
   * Reads every record of a task list in position order.
   *
   * @returns The records; empty when the list does not exist.
   * @throws TaskStoreError with `corruption_error` when a record cannot be parsed.
   */
  async readTaskRecords(taskListId: string): Promise<TaskRecord[]> {
    const tasksDir = this.getTasksDir(taskListId);
    const records: TaskRecord[] = [];

    for (const { position, fileName } of await this.listRecordFiles(tasksDir)) {
      const filePath = join(tasksDir, fileName);
      const content = await safeReadTextFile(filePath);

      let data: unknown;
      try {
        data = JSON.parse(content);
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw new TaskStoreError(
          `Corrupted task record "${filePath}": ${cause.message}`,
          'corruption_error',
          { cause }
        );
      }

      const record = toTaskRecordShape(data, position);
      if (typeof record === 'string') {
        throw new TaskStoreError(`Corrupted task record "${filePath}": ${record}`, 'corruption_error');
      }
      records.push(record);
    }

    return records;
  }

  /**
   * Writes a task set to a list, then retires records above the highest written
   * position.
   *
   * Every record is replaced atomically; graph edges override those embedded in the
   * tasks. Filesystem failures are returned, not thrown, and earlier writes are not
   * rolled back.
   */
  async writeTasks(
    taskListId: string,
    tasks: readonly TaskToWrite[],
    graph?: DependencyGraph,
    options: WriteTasksOptions = {}
  ): Promise<TaskWriteResult> {
    if (taskListId === '') {
      return { success: false, taskListId: '', tasksWritten: 0, error: 'No task list id provided' };
    }

    const tasksDir = this.getTasksDir(taskListId);
    const { markExtraObsolete = true } = options;

    try {
      await safeMkdir(tasksDir, { recursive: true });
      let maxWrittenPosition = 0;

      for (const task of tasks) {
        const record = toTaskRecord(task, graph?.get(task.position));
        await atomicWrite(join(tasksDir, `${String(task.position)}.json`), serializeRecord(record), {
          logger: this.log,
        });
        maxWrittenPosition = Math.max(maxWrittenPosition, task.position);
        this.log.debug('task_written', { taskListId, position: task.position, status: task.status });
      }

      const retiredPositions = markExtraObsolete
        ? await this.retireAbove(taskListId, tasksDir, maxWrittenPosition)
        : [];

      return { success: true, taskListId, tasksWritten: tasks.length, tasksDir, retiredPositions };
    } catch (error) {
      if (isErrnoException(error)) {
        this.log.error('task_write_failed', { taskListId, code: error.code, error: error.message });
        return { success: false, taskListId, tasksWritten: 0, error: describeFsError(error) };
      }
      throw error;
    }
  }

  /**
   * Marks records above `maxWrittenPosition` as retired.
   *
   * Already retired records are not rewritten; fields other than subject and status
   * are kept. Unparseable records are left in place.
   */
  private async retireAbove(
    taskListId: string,
    tasksDir: string,
    maxWrittenPosition: number
  ): Promise<number[]> {
    const retired: number[] = [];

    for (const { position, fileName } of await this.listRecordFiles(tasksDir)) {
      if (position <= maxWrittenPosition) {
        continue;
      }

      const filePath = join(tasksDir, fileName);
      let data: unknown;
      try {
        data = JSON.parse(await safeReadTextFile(filePath));
      } catch (error) {
        if (!(error instanceof SyntaxError)) {
          throw error;
        }
        this.log.warn('task_record_unreadable', { taskListId, position, error: error.message });
        continue;
      }

      if (!isRecord(data)) {
        this.log.warn('task_record_unreadable', {
          taskListId,
          position,
          error: 'record is not a JSON object',
        });
        continue;
      }
      if (isRetired(data)) {
        continue;
      }

      const updated: Record<string, unknown> = {
        ...data,
        subject: OBSOLETE_SUBJECT,
        status: 'completed',
        blocks: data.blocks ?? [],
        blockedBy: data.blockedBy ?? [],
      };
      await atomicWrite(filePath, serializeRecord(updated), { logger: this.log });
      retired.push(position);
      this.log.info('task_retired', { taskListId, position });
    }

    return retired;
  }
}
