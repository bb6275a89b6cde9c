import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { SessionEnvironment } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import { checkTaskListConflict, resolveTaskListContext } from './resolver.js';
import { TaskStore } from './storage.js';
import type { TaskToWrite } from './types.js';

function sessionEnv(overrides: Partial<SessionEnvironment> = {}): SessionEnvironment {
  return {
    ambientSessionId: undefined,
    userTaskListId: undefined,
    capturedSessionId: undefined,
    envFile: undefined,
    ...overrides,
  };
}

describe('resolveTaskListContext', () => {
  it('should prefer the explicit id over every other source', () => {
    const context = resolveTaskListContext(
      'explicit-1',
      sessionEnv({ userTaskListId: 'pinned', ambientSessionId: 'explicit-1' })
    );

    expect(context).toEqual({
      taskListId: 'explicit-1',
      source: 'explicit',
      isUserSpecified: false,
      idsMatched: true,
    });
  });

  it('should report a mismatch between explicit and ambient ids', () => {
    const context = resolveTaskListContext('fresh', sessionEnv({ ambientSessionId: 'stale' }));

    expect(context.taskListId).toBe('fresh');
    expect(context.idsMatched).toBe(false);
  });

  it('should fall back to the user-configured id', () => {
    const context = resolveTaskListContext(
      undefined,
      sessionEnv({ userTaskListId: 'pinned', ambientSessionId: 'ambient' })
    );

    expect(context).toEqual({
      taskListId: 'pinned',
      source: 'user_configured',
      isUserSpecified: true,
      idsMatched: 'unknown',
    });
  });

  it('should fall back to the ambient id', () => {
    const context = resolveTaskListContext(null, sessionEnv({ ambientSessionId: 'ambient' }));

    expect(context).toEqual({
      taskListId: 'ambient',
      source: 'ambient',
      isUserSpecified: false,
      idsMatched: 'unknown',
    });
  });

  it('should report none when no source is available', () => {
    expect(resolveTaskListContext(undefined, sessionEnv())).toEqual({
      taskListId: null,
      source: 'none',
      isUserSpecified: false,
      idsMatched: 'unknown',
    });
  });

  it('should treat empty strings as absent', () => {
    const context = resolveTaskListContext(
      '',
      sessionEnv({ userTaskListId: '', ambientSessionId: 'ambient' })
    );

    expect(context.source).toBe('ambient');
    expect(context.idsMatched).toBe('unknown');
  });
});

describe('checkTaskListConflict', () => {
  let root: string;
  let store: TaskStore;

  const liveTasks: TaskToWrite[] = [1, 2, 3, 4].map((position) => ({
    position,
    subject: `Existing ${String(position)}`,
    description: '',
    activeForm: '',
    status: 'pending',
    blocks: [],
    blockedBy: [],
  }));

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'resolver-test-'));
    store = new TaskStore({ tasksRoot: root, logger: new Logger({ component: 'ResolverTest' }) });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should flag live records under a user-configured id', async () => {
    await store.writeTasks('pinned', liveTasks);
    const context = resolveTaskListContext(undefined, sessionEnv({ userTaskListId: 'pinned' }));

    expect(await checkTaskListConflict(context, store)).toEqual({
      conflict: true,
      existingTaskCount: 4,
      sampleSubjects: ['Existing 1', 'Existing 2', 'Existing 3'],
    });
  });

  it('should never flag explicit or ambient ids', async () => {
    await store.writeTasks('shared', liveTasks);

    const explicit = resolveTaskListContext('shared', sessionEnv());
    const ambient = resolveTaskListContext(undefined, sessionEnv({ ambientSessionId: 'shared' }));

    expect(await checkTaskListConflict(explicit, store)).toEqual({ conflict: false });
    expect(await checkTaskListConflict(ambient, store)).toEqual({ conflict: false });
  });

  it('should ignore retired records', async () => {
    await store.writeTasks('pinned', liveTasks);
    await store.writeTasks('pinned', []);
    const context = resolveTaskListContext(undefined, sessionEnv({ userTaskListId: 'pinned' }));

    expect(await checkTaskListConflict(context, store)).toEqual({ conflict: false });
  });

  it('should not conflict for an empty or missing list', async () => {
    const context = resolveTaskListContext(undefined, sessionEnv({ userTaskListId: 'fresh' }));

    expect(await checkTaskListConflict(context, store)).toEqual({ conflict: false });
  });
});
