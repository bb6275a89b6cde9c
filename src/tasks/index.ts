/**
 * Task module.
 *
 * Workflow task definitions, task list resolution and the on-disk task store.
 *
 * @packageDocumentation
 */

export type {
  TaskStatus,
  TaskToWrite,
  TaskRecord,
  DependencyEdges,
  DependencyGraph,
} from './types.js';

export { TASK_STATUSES, OBSOLETE_SUBJECT, isRetired, toTaskRecord } from './types.js';

export type { WorkflowTaskId, ContextTaskId, TaskDefinition, TaskContext } from './definitions.js';

export {
  TASK_IDS,
  WORKFLOW_STEP_ORDER,
  CONTEXT_TASK_IDS,
  TASK_DEFINITIONS,
  TASK_DEPENDENCIES,
  assignPositions,
  generateExpectedTasks,
  buildDependencyGraph,
  buildTaskPlan,
} from './definitions.js';

export type {
  TaskListSource,
  TaskListContext,
  ConflictCheckResult,
  TaskRecordReader,
} from './resolver.js';

export { CONFLICT_SAMPLE_SIZE, resolveTaskListContext, checkTaskListConflict } from './resolver.js';

export type {
  TaskStoreErrorType,
  TaskWriteResult,
  WriteTasksOptions,
  TaskStoreOptions,
} from './storage.js';

export { TaskStore, TaskStoreError } from './storage.js';
