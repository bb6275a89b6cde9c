/**
 * Configuration types for splitplan.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Location configuration for external stores.
 */
export interface PathConfig {
  /** Root directory holding one subdirectory per task list. `~` expands to the home directory. */
  tasks_root: string;
}

/**
 * Well-known file names inside a planning directory.
 */
export interface FileNameConfig {
  /** Checkpoint file. */
  state: string;
  /** Interview transcript; its existence marks the interview as complete. */
  interview: string;
  /** Project manifest holding the SPLIT_MANIFEST block. */
  manifest: string;
  /** Per-split marker file written once a split's spec exists. */
  spec: string;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Whether debug-level entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from splitplan.toml.
 */
export interface Config {
  paths: PathConfig;
  files: FileNameConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  paths?: Partial<PathConfig>;
  files?: Partial<FileNameConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Host-provided identity values, read once at the process boundary.
 *
 * Core logic receives this struct by parameter and never reads the environment itself.
 */
export interface SessionEnvironment {
  /** Ambient session identifier (`CLAUDE_SESSION_ID`); may be stale after a session reset. */
  readonly ambientSessionId: string | undefined;
  /** Task list pinned by the user (`CLAUDE_CODE_TASK_LIST_ID`). */
  readonly userTaskListId: string | undefined;
  /** Session id previously exported by the capture hook (`SPLITPLAN_SESSION_ID`). */
  readonly capturedSessionId: string | undefined;
  /** File the host sources into later shell commands (`CLAUDE_ENV_FILE`). */
  readonly envFile: string | undefined;
}
