/**
 * Failure documents and suggestions for the splitplan CLI.
 *
 * Every expected failure is printed as one JSON document carrying its category,
 * the error, a one-line summary and suggestions for resolving it.
 *
 * @packageDocumentation
 */

import type { SetupFailureCategory } from '../session/setup.js';

/**
 * Failure categories surfaced by CLI commands.
 */
export type FailureCategory =
  | SetupFailureCategory
  | 'manifest_error'
  | 'usage_error'
  | 'config_error';

/**
 * Suggestion item for resolving a failure.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Failure document printed on stdout.
 */
export interface FailureOutput {
  readonly success: false;
  readonly category: FailureCategory;
  readonly error: string;
  readonly message: string;
  readonly suggestions: readonly string[];
  readonly [detail: string]: unknown;
}

const FAILURE_SUMMARIES: Readonly<Record<FailureCategory, string>> = {
  validation_error: 'Input validation failed',
  corrupted_state: 'Session state is corrupted',
  checkpoint_write_error: 'Session checkpoint could not be written',
  no_target: 'No task list to write to',
  conflict: 'Task list already holds live tasks',
  task_write_error: 'Task list could not be written',
  manifest_error: 'Manifest validation failed',
  usage_error: 'Invalid command line',
  config_error: 'Configuration is invalid',
};

const FAILURE_SUGGESTIONS: Readonly<Record<FailureCategory, readonly Suggestion[]>> = {
  validation_error: [
    { text: 'Pass the path of an existing, non-empty markdown file' },
    { text: 'Check the file permissions', action: 'ls -l <file>' },
  ],

  corrupted_state: [
    {
      text: 'Delete the session checkpoint to start over; artifacts in the planning directory are kept',
      action: 'rm <planning-dir>/split-session.json',
    },
    { text: 'Inspect or remove the unreadable task record named in the error' },
  ],

  checkpoint_write_error: [
    { text: 'Check that the planning directory is writable', action: 'ls -ld <planning-dir>' },
  ],

  no_target: [
    { text: 'Pass the session id explicitly', action: 'splitplan setup --session-id <id> ...' },
    { text: 'Install the capture-session hook so the session id is recorded on start' },
    { text: 'Set CLAUDE_CODE_TASK_LIST_ID to write to a named task list' },
  ],

  conflict: [
    {
      text: 'Overwrite the task list if its tasks are no longer needed',
      action: 'splitplan setup --force ...',
    },
    { text: 'Unset CLAUDE_CODE_TASK_LIST_ID to write to the session task list instead' },
  ],

  task_write_error: [
    { text: 'Check that the task store root is writable', action: 'ls -ld ~/.claude/tasks' },
    { text: 'Point SPLITPLAN_TASKS_ROOT at a writable directory' },
  ],

  manifest_error: [
    { text: 'Fix the listed entries in the SPLIT_MANIFEST block of the project manifest' },
    { text: 'Name splits NN-kebab-case with indices running from 01' },
  ],

  usage_error: [{ text: 'Show usage information', action: 'splitplan help' }],

  config_error: [
    { text: 'Fix the value named in the error in splitplan.toml' },
    { text: 'Check SPLITPLAN_* environment variables', action: 'env | grep SPLITPLAN_' },
  ],
};

/**
 * Gets suggestions for a failure category.
 */
export function getSuggestions(category: FailureCategory): readonly Suggestion[] {
  return FAILURE_SUGGESTIONS[category];
}

/**
 * Formats a suggestion as a single line.
 *
 * @example
 * ```typescript
 * formatSuggestion({ text: 'Show usage information', action: 'splitplan help' });
 * // "Show usage information: splitplan help"
 * ```
 */
export function formatSuggestion(suggestion: Suggestion): string {
  return suggestion.action === undefined ? suggestion.text : `${suggestion.text}: ${suggestion.action}`;
}

/**
 * Builds the failure document for a category.
 *
 * @param details - Extra fields copied into the document, such as conflict counts.
 */
export function toFailureOutput(
  category: FailureCategory,
  error: string,
  details: Readonly<Record<string, unknown>> = {}
): FailureOutput {
  return {
    ...details,
    success: false,
    category,
    error,
    message: FAILURE_SUMMARIES[category],
    suggestions: getSuggestions(category).map(formatSuggestion),
  };
}
