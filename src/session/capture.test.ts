import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { SessionEnvironment } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import { captureSession } from './capture.js';

const logger = new Logger({ component: 'CaptureTest' });

const NO_ENV: SessionEnvironment = {
  ambientSessionId: undefined,
  userTaskListId: undefined,
  capturedSessionId: undefined,
  envFile: undefined,
};

const PAYLOAD = JSON.stringify({ session_id: 'abc-123', transcript_path: '/tmp/t.jsonl' });

describe('captureSession', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'capture-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should surface the session id as additional context', async () => {
    const result = await captureSession(PAYLOAD, NO_ENV, logger);

    expect(result).toEqual({
      output: {
        hookSpecificOutput: {
          hookEventName: 'SessionStart',
          additionalContext: 'SPLITPLAN_SESSION_ID=abc-123',
        },
      },
      envFileLines: [],
    });
  });

  it('should stay quiet when the environment already carries the id', async () => {
    const result = await captureSession(PAYLOAD, { ...NO_ENV, capturedSessionId: 'abc-123' }, logger);

    expect(result.output).toBeNull();
  });

  it('should emit again when the carried id is stale', async () => {
    const result = await captureSession(PAYLOAD, { ...NO_ENV, capturedSessionId: 'old' }, logger);

    expect(result.output?.hookSpecificOutput.additionalContext).toBe('SPLITPLAN_SESSION_ID=abc-123');
  });

  it.each([
    ['invalid JSON', '{ nope'],
    ['a non-object', '[1, 2]'],
    ['a missing session id', JSON.stringify({ transcript_path: '/tmp/t.jsonl' })],
    ['an empty session id', JSON.stringify({ session_id: '' })],
  ])('should do nothing for %s', async (_label, payload) => {
    const envFile = join(dir, 'env.sh');

    expect(await captureSession(payload, { ...NO_ENV, envFile }, logger)).toEqual({
      output: null,
      envFileLines: [],
    });
  });

  it('should create the env file with both exports', async () => {
    const envFile = join(dir, 'env.sh');

    await captureSession(PAYLOAD, { ...NO_ENV, envFile }, logger);

    expect(await readFile(envFile, 'utf-8')).toBe(
      'export SPLITPLAN_SESSION_ID=abc-123\nexport CLAUDE_TRANSCRIPT_PATH=/tmp/t.jsonl\n'
    );
  });

  it('should append only the missing lines', async () => {
    const envFile = join(dir, 'env.sh');
    await writeFile(envFile, 'export PATH=/usr/bin\nexport SPLITPLAN_SESSION_ID=abc-123\n');

    const result = await captureSession(PAYLOAD, { ...NO_ENV, envFile }, logger);

    expect(result.envFileLines).toEqual(['export CLAUDE_TRANSCRIPT_PATH=/tmp/t.jsonl\n']);
    expect(await readFile(envFile, 'utf-8')).toBe(
      'export PATH=/usr/bin\nexport SPLITPLAN_SESSION_ID=abc-123\n' +
        'export CLAUDE_TRANSCRIPT_PATH=/tmp/t.jsonl\n'
    );
  });

  it('should be idempotent across runs', async () => {
    const envFile = join(dir, 'env.sh');
    await captureSession(PAYLOAD, { ...NO_ENV, envFile }, logger);

    const second = await captureSession(PAYLOAD, { ...NO_ENV, envFile }, logger);

    expect(second.envFileLines).toEqual([]);
  });

  it('should omit the transcript line when the payload has no path', async () => {
    const envFile = join(dir, 'env.sh');

    await captureSession(JSON.stringify({ session_id: 'abc-123' }), { ...NO_ENV, envFile }, logger);

    expect(await readFile(envFile, 'utf-8')).toBe('export SPLITPLAN_SESSION_ID=abc-123\n');
  });

  it('should still return the context output when the env file is unusable', async () => {
    const envFile = join(dir, 'a-directory');
    await mkdir(envFile);

    const result = await captureSession(PAYLOAD, { ...NO_ENV, envFile }, logger);

    expect(result.envFileLines).toEqual([]);
    expect(result.output).not.toBeNull();
  });
});
