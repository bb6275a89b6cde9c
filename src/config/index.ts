/**
 * Configuration module for splitplan.toml parsing and environment overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  FileNameConfig,
  LoggingConfig,
  PartialConfig,
  PathConfig,
  SessionEnvironment,
} from './types.js';
export {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  DEFAULT_FILES,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
} from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  readSessionEnvironment,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { expandHome, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
