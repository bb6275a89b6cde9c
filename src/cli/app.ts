/**
 * Application wiring for the splitplan CLI.
 */

import {
  ConfigParseError,
  EnvCoercionError,
  expandHome,
  getDefaultConfig,
  loadConfig,
  readSessionEnvironment,
  type Config,
  type EnvRecord,
} from '../config/index.js';
import { Logger } from '../utils/logger.js';
import { handleCaptureSessionCommand } from './commands/capture-session.js';
import { handleCreateDirsCommand } from './commands/create-dirs.js';
import { handleHelpCommand } from './commands/help.js';
import { handleSetupCommand } from './commands/setup.js';
import { handleStatusCommand } from './commands/status.js';
import { handleVersionCommand } from './commands/version.js';
import { toFailureOutput } from './errors.js';
import type { CliCommandHandler, CliContext, CliIO } from './types.js';
import { UsageError } from './utils/args.js';
import { withErrorHandling, writeJson } from './utils/errorHandling.js';

/**
 * Process surroundings of a CLI run.
 */
export interface CliEnvironment {
  cwd: string;
  env: EnvRecord;
  io: CliIO;
  /** Home directory used to expand `~`; defaults to the current user's. */
  home?: string;
}

const COMMAND_HANDLERS: Readonly<Record<string, CliCommandHandler>> = {
  setup: handleSetupCommand,
  'create-dirs': handleCreateDirsCommand,
  status: handleStatusCommand,
};

/**
 * Creates the CLI context for a command.
 *
 * @throws ConfigParseError if splitplan.toml is invalid.
 * @throws EnvCoercionError if a SPLITPLAN_* override cannot be coerced.
 */
export async function createCliApp(args: string[], environment: CliEnvironment): Promise<CliContext> {
  const config = await loadConfig({
    cwd: environment.cwd,
    env: environment.env,
    ...(environment.home !== undefined ? { home: environment.home } : {}),
  });
  return contextFor(args, environment, config);
}

function contextFor(args: string[], environment: CliEnvironment, config: Config): CliContext {
  return {
    args,
    cwd: environment.cwd,
    env: environment.env,
    config,
    sessionEnv: readSessionEnvironment(environment.env),
    logger: new Logger({ component: 'splitplan', debugMode: config.logging.debug }),
    io: environment.io,
  };
}

function isConfigError(error: unknown): error is ConfigParseError | EnvCoercionError {
  return error instanceof ConfigParseError || error instanceof EnvCoercionError;
}

/**
 * Context for the capture hook, falling back to defaults when configuration cannot be loaded.
 */
async function createCaptureContext(args: string[], environment: CliEnvironment): Promise<CliContext> {
  try {
    return await createCliApp(args, environment);
  } catch (error) {
    const defaults = getDefaultConfig();
    const config: Config = {
      ...defaults,
      paths: { tasks_root: expandHome(defaults.paths.tasks_root, environment.home) },
    };
    const context = contextFor(args, environment, config);
    context.logger.warn('config_load_failed', {
      error: error instanceof Error ? error.message : String(error),
      fallback: 'defaults',
    });
    return context;
  }
}

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the executable, starting with the command name.
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], environment: CliEnvironment): Promise<number> {
  const [command = 'help', ...args] = argv;
  const { io } = environment;

  return withErrorHandling(io, async () => {
    switch (command) {
      case 'help':
      case '--help':
      case '-h':
        return handleHelpCommand(io, args);
      case 'version':
      case '--version':
      case '-v':
        return handleVersionCommand(io);
      case 'capture-session':
        return handleCaptureSessionCommand(await createCaptureContext(args, environment));
      default:
        break;
    }

    const handler = Object.hasOwn(COMMAND_HANDLERS, command) ? COMMAND_HANDLERS[command] : undefined;
    if (handler === undefined) {
      throw new UsageError(`Unknown command: ${command}`);
    }
    if (args.includes('--help') || args.includes('-h')) {
      return handleHelpCommand(io, [command]);
    }

    let context: CliContext;
    try {
      context = await createCliApp(args, environment);
    } catch (error) {
      if (isConfigError(error)) {
        writeJson(io, toFailureOutput('config_error', error.message));
        return { exitCode: 1 };
      }
      throw error;
    }
    return handler(context);
  });
}
