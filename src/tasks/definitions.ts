/**
 * Workflow task definitions and dependency graph.
 *
 * Eight workflow tasks, one per step, are followed by three context tasks that
 * surface the session parameters in the task list. Positions are stable across
 * runs: the store identifies records by position, so a status change always lands
 * on the same record.
 *
 * @packageDocumentation
 */

import type { WorkflowStep } from '../session/detector.js';
import type { DependencyEdges, DependencyGraph, TaskStatus, TaskToWrite } from './types.js';

/**
 * Task ids keyed by workflow step.
 */
export const TASK_IDS = {
  0: 'validate-setup',
  1: 'conduct-interview',
  2: 'analyze-splits',
  3: 'write-manifest',
  4: 'confirm-splits',
  5: 'create-directories',
  6: 'generate-specs',
  7: 'output-summary',
} as const satisfies Record<WorkflowStep, string>;

/**
 * Workflow task id.
 */
export type WorkflowTaskId = (typeof TASK_IDS)[WorkflowStep];

/**
 * Workflow steps in order.
 */
export const WORKFLOW_STEP_ORDER: readonly WorkflowStep[] = [0, 1, 2, 3, 4, 5, 6, 7];

/**
 * Context task ids, in position order.
 */
export const CONTEXT_TASK_IDS = [
  'context-plugin-root',
  'context-planning-dir',
  'context-initial-file',
] as const;

/**
 * Context task id.
 */
export type ContextTaskId = (typeof CONTEXT_TASK_IDS)[number];

/**
 * Display text of a workflow task.
 */
export interface TaskDefinition {
  readonly subject: string;
  readonly description: string;
  readonly activeForm: string;
}

export const TASK_DEFINITIONS: Readonly<Record<WorkflowTaskId, TaskDefinition>> = {
  'validate-setup': {
    subject: 'Validate input and setup session',
    description: 'Validate the input file exists and is readable. Initialize session state.',
    activeForm: 'Setting up session',
  },
  'conduct-interview': {
    subject: 'Conduct interview',
    description: 'Interview the user to understand project requirements and constraints.',
    activeForm: 'Interviewing user',
  },
  'analyze-splits': {
    subject: 'Analyze splits',
    description: 'Analyze the requirements and propose how to split the project.',
    activeForm: 'Analyzing splits',
  },
  'write-manifest': {
    subject: 'Discover dependencies and write manifest',
    description: 'Discover dependencies between splits and write the project manifest.',
    activeForm: 'Writing manifest',
  },
  'confirm-splits': {
    subject: 'Confirm splits with user',
    description: 'Present the proposed splits to the user for confirmation or revision.',
    activeForm: 'Confirming splits',
  },
  'create-directories': {
    subject: 'Create split directories',
    description: 'Create the NN-name/ directories for each confirmed split.',
    activeForm: 'Creating directories',
  },
  'generate-specs': {
    subject: 'Generate spec files',
    description: 'Generate a spec file for each split directory.',
    activeForm: 'Generating specs',
  },
  'output-summary': {
    subject: 'Output summary',
    description: 'Output a summary of the completed workflow.',
    activeForm: 'Outputting summary',
  },
};

/**
 * What each workflow task is blocked by. The chain is strictly linear; the inline
 * steps 3 and 5 take part in it like any other.
 */
export const TASK_DEPENDENCIES: Readonly<Record<WorkflowTaskId, readonly WorkflowTaskId[]>> = {
  'validate-setup': [],
  'conduct-interview': ['validate-setup'],
  'analyze-splits': ['conduct-interview'],
  'write-manifest': ['analyze-splits'],
  'confirm-splits': ['write-manifest'],
  'create-directories': ['confirm-splits'],
  'generate-specs': ['create-directories'],
  'output-summary': ['generate-specs'],
};

/**
 * Session parameters shown by the context tasks.
 */
export interface TaskContext {
  readonly pluginRoot: string;
  readonly planningDir: string;
  readonly initialFile: string;
}

/**
 * Assigns positions: workflow tasks in step order, then context tasks.
 *
 * @param startPosition - Position of the first workflow task.
 */
export function assignPositions(startPosition = 1): Map<string, number> {
  const positions = new Map<string, number>();
  let position = startPosition;

  for (const step of WORKFLOW_STEP_ORDER) {
    positions.set(TASK_IDS[step], position);
    position += 1;
  }
  for (const id of CONTEXT_TASK_IDS) {
    positions.set(id, position);
    position += 1;
  }

  return positions;
}

function statusForStep(step: WorkflowStep, currentStep: WorkflowStep): TaskStatus {
  if (step < currentStep) {
    return 'completed';
  }
  return step === currentStep ? 'in_progress' : 'pending';
}

function requirePosition(positions: ReadonlyMap<string, number>, id: string): number {
  const position = positions.get(id);
  if (position === undefined) {
    throw new Error(`No position assigned to task '${id}'`);
  }
  return position;
}

/**
 * Builds the full task set for a workflow position.
 *
 * Steps before `currentStep` are completed, `currentStep` is in progress and later
 * steps are pending. Context tasks are always pending and blocked by the summary task.
 */
export function generateExpectedTasks(currentStep: WorkflowStep, context: TaskContext): TaskToWrite[] {
  const positions = assignPositions();

  const workflowTasks = WORKFLOW_STEP_ORDER.map((step): TaskToWrite => {
    const id = TASK_IDS[step];
    const definition = TASK_DEFINITIONS[id];
    return {
      position: requirePosition(positions, id),
      subject: definition.subject,
      description: definition.description,
      activeForm: definition.activeForm,
      status: statusForStep(step, currentStep),
      blocks: [],
      blockedBy: [],
    };
  });

  const summaryPosition = String(requirePosition(positions, TASK_IDS[7]));
  const contextValues: Record<ContextTaskId, string> = {
    'context-plugin-root': `plugin_root=${context.pluginRoot}`,
    'context-planning-dir': `planning_dir=${context.planningDir}`,
    'context-initial-file': `initial_file=${context.initialFile}`,
  };

  const contextTasks = CONTEXT_TASK_IDS.map(
    (id): TaskToWrite => ({
      position: requirePosition(positions, id),
      subject: contextValues[id],
      description: 'Session context item',
      activeForm: 'Context',
      status: 'pending',
      blocks: [],
      blockedBy: [summaryPosition],
    })
  );

  return [...workflowTasks, ...contextTasks];
}

/**
 * Resolves declared dependencies into position-keyed edges.
 *
 * Edges whose endpoints have no position, or whose child is not in `tasks`, are
 * dropped. `blocks` is the exact inverse of `blockedBy`.
 *
 * @param declaredDeps - Task id to the ids it is blocked by.
 * @param positions - Task id to position.
 */
export function buildDependencyGraph(
  tasks: readonly Pick<TaskToWrite, 'position'>[],
  declaredDeps: Readonly<Record<string, readonly string[]>>,
  positions: ReadonlyMap<string, number>
): Map<number, DependencyEdges> {
  const blocks = new Map<number, string[]>();
  const blockedBy = new Map<number, string[]>();
  for (const task of tasks) {
    blocks.set(task.position, []);
    blockedBy.set(task.position, []);
  }

  for (const [id, parents] of Object.entries(declaredDeps)) {
    const position = positions.get(id);
    const childEdges = position === undefined ? undefined : blockedBy.get(position);
    if (childEdges === undefined) {
      continue;
    }
    for (const parent of parents) {
      const parentPosition = positions.get(parent);
      if (parentPosition !== undefined) {
        childEdges.push(String(parentPosition));
      }
    }
  }

  for (const [position, parents] of blockedBy) {
    for (const parent of parents) {
      blocks.get(Number(parent))?.push(String(position));
    }
  }

  const graph = new Map<number, DependencyEdges>();
  for (const [position, edges] of blockedBy) {
    graph.set(position, { blocks: blocks.get(position) ?? [], blockedBy: edges });
  }
  return graph;
}

/**
 * Builds the task set and its dependency graph for a workflow position.
 *
 * The graph includes the context tasks' edge to the summary task, so the summary
 * task's `blocks` lists them.
 */
export function buildTaskPlan(
  currentStep: WorkflowStep,
  context: TaskContext
): { tasks: TaskToWrite[]; graph: DependencyGraph } {
  const tasks = generateExpectedTasks(currentStep, context);
  const contextDeps: Record<string, readonly string[]> = {};
  for (const id of CONTEXT_TASK_IDS) {
    contextDeps[id] = [TASK_IDS[7]];
  }

  const graph = buildDependencyGraph(
    tasks,
    { ...TASK_DEPENDENCIES, ...contextDeps },
    assignPositions()
  );
  return { tasks, graph };
}
