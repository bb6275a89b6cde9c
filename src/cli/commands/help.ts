/**
 * Help command handler for the splitplan CLI.
 */

import { getEnvVarDocumentation } from '../../config/env.js';
import type { CliCommandResult, CliIO } from '../types.js';
import { UsageError } from '../utils/args.js';
import { writeJson } from '../utils/errorHandling.js';

interface CommandHelp {
  readonly usage: string;
  readonly description: string;
}

export const COMMAND_HELP: Readonly<Record<string, CommandHelp>> = {
  setup: {
    usage: 'splitplan setup --file <path> --plugin-root <dir> [--session-id <id>] [--force]',
    description:
      'Start or resume a session for a requirements file and sync the task list to the ' +
      'resumed step. --force writes over live tasks in a user-configured task list.',
  },
  'create-dirs': {
    usage: 'splitplan create-dirs <planning-dir>',
    description: 'Create the split directories listed in the project manifest.',
  },
  'capture-session': {
    usage: 'splitplan capture-session',
    description: 'SessionStart hook: read the host payload from stdin and record the session id.',
  },
  status: {
    usage: 'splitplan status <planning-dir> [--file <path>]',
    description:
      'Show the session state of a planning directory without changing anything. ' +
      'With --file, also report whether that input changed since the session started.',
  },
  help: {
    usage: 'splitplan help [command]',
    description: 'Show this help, or the help for one command.',
  },
  version: {
    usage: 'splitplan version',
    description: 'Show version information.',
  },
};

/**
 * Handles `splitplan help [command]`.
 *
 * @throws UsageError for an unknown command name.
 */
export function handleHelpCommand(io: CliIO, args: readonly string[]): CliCommandResult {
  const [commandName] = args;

  if (commandName === undefined) {
    writeJson(io, {
      success: true,
      usage: 'splitplan <command> [options]',
      commands: COMMAND_HELP,
      environment: getEnvVarDocumentation(),
    });
    return { exitCode: 0 };
  }

  const help = Object.hasOwn(COMMAND_HELP, commandName) ? COMMAND_HELP[commandName] : undefined;
  if (help === undefined) {
    throw new UsageError(`Unknown command: ${commandName}`);
  }
  writeJson(io, { success: true, command: commandName, ...help });
  return { exitCode: 0 };
}
