import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigParseError, expandHome, loadConfig } from './index.js';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'config-loader-test-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('should use the defaults when no config file exists', async () => {
    const config = await loadConfig({ cwd, env: {}, home: '/home/dev' });

    expect(config.paths.tasks_root).toBe('/home/dev/.claude/tasks');
    expect(config.files.state).toBe('split-session.json');
  });

  it('should read splitplan.toml from the working directory', async () => {
    await writeFile(
      join(cwd, 'splitplan.toml'),
      '[paths]\ntasks_root = "~/tasks"\n\n[logging]\ndebug = true\n'
    );

    const config = await loadConfig({ cwd, env: {}, home: '/home/dev' });

    expect(config.paths.tasks_root).toBe('/home/dev/tasks');
    expect(config.logging.debug).toBe(true);
  });

  it('should apply environment overrides over the file', async () => {
    await writeFile(join(cwd, 'splitplan.toml'), '[logging]\ndebug = true\n');

    const config = await loadConfig({
      cwd,
      env: { SPLITPLAN_DEBUG: 'false', SPLITPLAN_TASKS_ROOT: '/srv/tasks' },
      home: '/home/dev',
    });

    expect(config.logging.debug).toBe(false);
    expect(config.paths.tasks_root).toBe('/srv/tasks');
  });

  it('should surface invalid files as ConfigParseError', async () => {
    await writeFile(join(cwd, 'splitplan.toml'), '[paths\n');

    await expect(loadConfig({ cwd, env: {} })).rejects.toThrow(ConfigParseError);
  });
});

describe('expandHome', () => {
  it('should expand a bare tilde and a tilde prefix only', () => {
    expect(expandHome('~', '/home/dev')).toBe('/home/dev');
    expect(expandHome('~/.claude/tasks', '/home/dev')).toBe('/home/dev/.claude/tasks');
    expect(expandHome('/srv/~/tasks', '/home/dev')).toBe('/srv/~/tasks');
    expect(expandHome('~other/tasks', '/home/dev')).toBe('~other/tasks');
  });
});
