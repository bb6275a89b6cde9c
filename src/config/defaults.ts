/**
 * Default configuration values for splitplan.toml.
 *
 * @packageDocumentation
 */

import type { Config, FileNameConfig, LoggingConfig, PathConfig } from './types.js';

/**
 * Name of the optional configuration file looked up in the working directory.
 */
export const CONFIG_FILENAME = 'splitplan.toml';

/**
 * Default store locations.
 */
export const DEFAULT_PATHS: PathConfig = {
  tasks_root: '~/.claude/tasks',
};

/**
 * Default planning-directory file names.
 */
export const DEFAULT_FILES: FileNameConfig = {
  state: 'split-session.json',
  interview: 'split-interview.md',
  manifest: 'project-manifest.md',
  spec: 'spec.md',
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  files: DEFAULT_FILES,
  logging: DEFAULT_LOGGING,
};
