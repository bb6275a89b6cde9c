/**
 * Integration tests for the CLI.
 *
 * Drives a whole planning session through the commands the host invokes: capture,
 * setup, directory creation and repeated setup runs as artifacts appear, checking
 * the task records each run leaves on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCli } from '../../src/cli/app.js';
import type { CliIO } from '../../src/cli/types.js';

describe('CLI Integration Tests', () => {
  let testDir: string;
  let planningDir: string;
  let tasksRoot: string;
  let envFile: string;
  let env: Record<string, string | undefined>;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'splitplan-it-'));
    planningDir = join(testDir, 'plan');
    tasksRoot = join(testDir, 'tasks');
    envFile = join(testDir, 'env.sh');
    await mkdir(planningDir);
    await writeFile(join(planningDir, 'requirements.md'), '# Shop\n\nA web shop with an API.\n');
    env = { SPLITPLAN_TASKS_ROOT: tasksRoot, CLAUDE_ENV_FILE: envFile };
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function run(args: string[], stdin = ''): Promise<{ exitCode: number; output: unknown }> {
    let out = '';
    const io: CliIO = {
      stdout: (text) => {
        out += text;
      },
      stderr: () => undefined,
      readStdin: () => Promise.resolve(stdin),
    };
    const exitCode = await runCli(args, { cwd: testDir, env, io, home: join(testDir, 'home') });
    return { exitCode, output: JSON.parse(out) };
  }

  async function setup(): Promise<{ exitCode: number; output: unknown }> {
    return run(['setup', '--file', 'plan/requirements.md', '--plugin-root', '/opt/plugin']);
  }

  async function record(position: number): Promise<unknown> {
    return JSON.parse(await readFile(join(tasksRoot, 'sess-42', `${String(position)}.json`), 'utf-8'));
  }

  async function workflowStatuses(): Promise<string[]> {
    const statuses: string[] = [];
    for (let position = 1; position <= 8; position++) {
      const data = await record(position);
      statuses.push(
        typeof data === 'object' && data !== null ? String(Reflect.get(data, 'status')) : ''
      );
    }
    return statuses;
  }

  it('should carry a session from capture to summary', async () => {
    const captured = await run(
      ['capture-session'],
      JSON.stringify({ session_id: 'sess-42', transcript_path: '/tmp/transcript.jsonl' })
    );
    expect(captured.exitCode).toBe(0);
    expect(await readFile(envFile, 'utf-8')).toBe(
      'export SPLITPLAN_SESSION_ID=sess-42\nexport CLAUDE_TRANSCRIPT_PATH=/tmp/transcript.jsonl\n'
    );

    // The host sources the env file before running later commands.
    env.SPLITPLAN_SESSION_ID = 'sess-42';
    env.CLAUDE_SESSION_ID = 'sess-42';

    const first = await setup();
    expect(first).toMatchObject({
      exitCode: 0,
      output: { mode: 'new', resumeFromStep: 1, taskListId: 'sess-42', idsMatched: true },
    });
    expect(await workflowStatuses()).toEqual([
      'completed',
      'in_progress',
      'pending',
      'pending',
      'pending',
      'pending',
      'pending',
      'pending',
    ]);

    await writeFile(join(planningDir, 'split-interview.md'), '# Interview\n');
    await writeFile(
      join(planningDir, 'project-manifest.md'),
      '# Manifest\n\n<!-- SPLIT_MANIFEST\n01-api\n02-storefront\nEND_MANIFEST -->\n'
    );
    expect(await setup()).toMatchObject({ output: { mode: 'resume', resumeFromStep: 4 } });

    const dirs = await run(['create-dirs', 'plan']);
    expect(dirs).toMatchObject({
      exitCode: 0,
      output: { created: ['01-api', '02-storefront'], skipped: [] },
    });
    expect(await setup()).toMatchObject({
      output: { resumeFromStep: 6, existingSplits: ['01-api', '02-storefront'] },
    });

    await writeFile(join(planningDir, '01-api', 'spec.md'), '# API\n');
    expect(await setup()).toMatchObject({ output: { resumeFromStep: 6 } });

    await writeFile(join(planningDir, '02-storefront', 'spec.md'), '# Storefront\n');
    expect(await setup()).toMatchObject({ output: { resumeFromStep: 7 } });
    expect(await workflowStatuses()).toEqual([
      'completed',
      'completed',
      'completed',
      'completed',
      'completed',
      'completed',
      'completed',
      'in_progress',
    ]);

    const status = await run(['status', 'plan', '--file', 'plan/requirements.md']);
    expect(status.output).toMatchObject({
      hasCheckpoint: true,
      inputChanged: false,
      resumeStepName: 'complete',
    });
  });

  it('should retire records left over from a longer task list', async () => {
    const listDir = join(tasksRoot, 'sess-42');
    await mkdir(listDir, { recursive: true });
    for (let position = 1; position <= 14; position++) {
      await writeFile(
        join(listDir, `${String(position)}.json`),
        JSON.stringify({ id: String(position), subject: `Old task ${String(position)}`, status: 'in_progress' })
      );
    }
    env.CLAUDE_SESSION_ID = 'sess-42';

    expect((await setup()).exitCode).toBe(0);

    expect(await readdir(listDir)).toHaveLength(14);
    expect(await record(12)).toEqual({
      id: '12',
      subject: '[obsolete]',
      status: 'completed',
      blocks: [],
      blockedBy: [],
    });
    expect(await record(11)).toMatchObject({
      subject: `initial_file=${join(planningDir, 'requirements.md')}`,
      blockedBy: ['8'],
    });
  });

  it('should leave the task list alone when setup is refused', async () => {
    env.CLAUDE_CODE_TASK_LIST_ID = 'team-board';
    const listDir = join(tasksRoot, 'team-board');
    await mkdir(listDir, { recursive: true });
    const original = JSON.stringify({ id: '1', subject: 'Ship it', status: 'in_progress' });
    await writeFile(join(listDir, '1.json'), original);

    const refused = await setup();

    expect(refused).toMatchObject({ exitCode: 1, output: { category: 'conflict' } });
    expect(await readFile(join(listDir, '1.json'), 'utf-8')).toBe(original);

    const forced = await run([
      'setup',
      '--file',
      'plan/requirements.md',
      '--plugin-root',
      '/opt/plugin',
      '--force',
    ]);
    expect(forced).toMatchObject({ exitCode: 0, output: { taskListId: 'team-board' } });
    expect(await readdir(listDir)).toHaveLength(11);
  });
});
