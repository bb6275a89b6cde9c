/**
 * Command-line option parsing shared by CLI commands.
 */

/**
 * Error thrown for malformed command lines.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Options a command accepts, without their leading `--`.
 */
export interface OptionSpec {
  /** Options taking a value (`--file x` or `--file=x`). */
  values?: readonly string[];
  /** Boolean options. */
  flags?: readonly string[];
}

export interface ParsedArgs {
  values: ReadonlyMap<string, string>;
  flags: ReadonlySet<string>;
  positionals: readonly string[];
}

/**
 * Parses command arguments against an option spec.
 *
 * @throws UsageError on unknown options, repeated options or a missing value.
 */
export function parseArgs(args: readonly string[], spec: OptionSpec): ParsedArgs {
  const valueNames = new Set(spec.values ?? []);
  const flagNames = new Set(spec.flags ?? []);
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (flagNames.has(name) && eq === -1) {
      flags.add(name);
      continue;
    }
    if (!valueNames.has(name)) {
      throw new UsageError(`Unknown option: --${name}`);
    }
    if (values.has(name)) {
      throw new UsageError(`Option --${name} given more than once`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
      throw new UsageError(`Option --${name} requires a value`);
    }
    values.set(name, value);
  }

  return { values, flags, positionals };
}

/**
 * Gets a required option value.
 *
 * @throws UsageError when the option is absent.
 */
export function requireValue(parsed: ParsedArgs, name: string): string {
  const value = parsed.values.get(name);
  if (value === undefined) {
    throw new UsageError(`Missing required option: --${name}`);
  }
  return value;
}

/**
 * Gets the single positional argument of a command.
 *
 * @param label - What the argument names, for the error message.
 * @throws UsageError when there is not exactly one positional argument.
 */
export function requirePositional(parsed: ParsedArgs, label: string): string {
  const [first, ...rest] = parsed.positionals;
  if (first === undefined) {
    throw new UsageError(`Missing required argument: <${label}>`);
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest.join(' ')}`);
  }
  return first;
}

/**
 * Rejects positional arguments for commands that take none.
 *
 * @throws UsageError when any positional argument is present.
 */
export function rejectPositionals(parsed: ParsedArgs): void {
  if (parsed.positionals.length > 0) {
    throw new UsageError(`Unexpected argument: ${parsed.positionals.join(' ')}`);
  }
}
