/**
 * Resolves the effective configuration for a process.
 *
 * @packageDocumentation
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { safeExists, safeReadTextFile } from '../utils/safe-fs.js';
import { CONFIG_FILENAME } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Directory searched for splitplan.toml. */
  cwd: string;
  /** Environment supplying SPLITPLAN_* overrides. */
  env: EnvRecord;
  /** Home directory used to expand `~`; defaults to the current user's. */
  home?: string;
}

/**
 * Expands a leading `~` to `home`.
 *
 * @example
 * ```typescript
 * expandHome('~/.claude/tasks', '/home/dev'); // "/home/dev/.claude/tasks"
 * expandHome('/srv/tasks', '/home/dev'); // "/srv/tasks"
 * ```
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') {
    return home;
  }
  if (path.startsWith('~/')) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Loads splitplan.toml from `cwd` when present, applies environment overrides and
 * expands `~` in the tasks root.
 *
 * @throws ConfigParseError if the file is not valid configuration.
 * @throws EnvCoercionError if an override cannot be coerced.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<Config> {
  const configPath = join(options.cwd, CONFIG_FILENAME);
  const fromFile = (await safeExists(configPath))
    ? parseConfig(await safeReadTextFile(configPath))
    : getDefaultConfig();

  const config = applyEnvOverrides(fromFile, options.env);

  return {
    ...config,
    paths: { ...config.paths, tasks_root: expandHome(config.paths.tasks_root, options.home) },
  };
}
