/**
 * Environment variable overrides for configuration, and the host session environment.
 *
 * SPLITPLAN_* variables override configuration values at runtime. Environment
 * variables take precedence over config file values, which take precedence over
 * defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type {
  Config,
  FileNameConfig,
  LoggingConfig,
  PartialConfig,
  PathConfig,
  SessionEnvironment,
} from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { section: 'paths'; field: keyof Config['paths']; type: 'string' }
  | { section: 'files'; field: keyof Config['files']; type: 'string' }
  | { section: 'logging'; field: keyof Config['logging']; type: 'boolean' };

/**
 * Mapping from environment variable names to config paths.
 *
 * Format: SPLITPLAN_<SECTION>_<FIELD> maps to config.<section>.<field>, with the
 * shortcuts SPLITPLAN_TASKS_ROOT and SPLITPLAN_DEBUG.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  SPLITPLAN_TASKS_ROOT: { section: 'paths', field: 'tasks_root', type: 'string' },
  SPLITPLAN_DEBUG: { section: 'logging', field: 'debug', type: 'boolean' },
  SPLITPLAN_FILES_STATE: { section: 'files', field: 'state', type: 'string' },
  SPLITPLAN_FILES_INTERVIEW: { section: 'files', field: 'interview', type: 'string' },
  SPLITPLAN_FILES_MANIFEST: { section: 'files', field: 'manifest', type: 'string' },
  SPLITPLAN_FILES_SPEC: { section: 'files', field: 'spec', type: 'string' },
};

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }
  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty values are treated as unset.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ SPLITPLAN_DEBUG: 'yes' });
 * console.log(result.overrides.logging?.debug); // true
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      switch (mapping.section) {
        case 'paths': {
          const paths: Partial<PathConfig> = { ...overrides.paths };
          paths[mapping.field] = value;
          overrides.paths = paths;
          break;
        }
        case 'files': {
          const files: Partial<FileNameConfig> = { ...overrides.files };
          files[mapping.field] = value;
          overrides.files = files;
          break;
        }
        case 'logging': {
          const logging: Partial<LoggingConfig> = { ...overrides.logging };
          logging[mapping.field] = coerceToBoolean(value, envVar);
          overrides.logging = logging;
          break;
        }
      }
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    paths: { ...base.paths, ...partial.paths },
    files: { ...base.files, ...partial.files },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = getDefaultEnv()): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Reads the host identity variables into a {@link SessionEnvironment}.
 *
 * Empty values count as absent.
 *
 * @param env - The environment object to read from (defaults to process.env).
 */
export function readSessionEnvironment(env: EnvRecord = getDefaultEnv()): SessionEnvironment {
  return {
    ambientSessionId: nonEmpty(env.CLAUDE_SESSION_ID),
    userTaskListId: nonEmpty(env.CLAUDE_CODE_TASK_LIST_ID),
    capturedSessionId: nonEmpty(env.SPLITPLAN_SESSION_ID),
    envFile: nonEmpty(env.CLAUDE_ENV_FILE),
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return {
    SPLITPLAN_TASKS_ROOT: {
      description: 'Override the task store root directory (paths.tasks_root)',
      type: 'string',
    },
    SPLITPLAN_DEBUG: {
      description: 'Enable debug logging (logging.debug)',
      type: 'boolean',
    },
    SPLITPLAN_FILES_STATE: {
      description: 'Override the checkpoint file name (files.state)',
      type: 'string',
    },
    SPLITPLAN_FILES_INTERVIEW: {
      description: 'Override the interview transcript file name (files.interview)',
      type: 'string',
    },
    SPLITPLAN_FILES_MANIFEST: {
      description: 'Override the manifest file name (files.manifest)',
      type: 'string',
    },
    SPLITPLAN_FILES_SPEC: {
      description: 'Override the per-split spec file name (files.spec)',
      type: 'string',
    },
  };
}
