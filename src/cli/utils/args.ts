/**
 * Minimal argument parsing for CLI commands.
 */

/**
 * Declaration of the flags a command accepts.
 */
export interface FlagSpec {
  /** Flags taking a value, with their short aliases. */
  readonly values?: Readonly<Record<string, string | undefined>> | undefined;
  /** Boolean switches, with their short aliases. */
  readonly switches?: Readonly<Record<string, string | undefined>> | undefined;
}

/**
 * Parsed command arguments.
 */
export interface ParsedArgs {
  readonly positionals: string[];
  /** Values by long flag name, without the leading dashes. */
  readonly values: Map<string, string>;
  /** Long names of switches that were given. */
  readonly switches: Set<string>;
}

/**
 * Error raised for malformed command arguments.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

function resolveFlag(
  token: string,
  table: Readonly<Record<string, string | undefined>> | undefined
): string | undefined {
  if (table === undefined) {
    return undefined;
  }
  for (const [name, alias] of Object.entries(table)) {
    if (token === `--${name}` || (alias !== undefined && token === `-${alias}`)) {
      return name;
    }
  }
  return undefined;
}

/**
 * Splits arguments into positionals, valued flags and switches.
 *
 * `--flag=value` and `--flag value` are both accepted; everything after `--`
 * is positional.
 *
 * @throws ArgumentError for unknown flags and flags missing their value.
 */
export function parseArgs(args: readonly string[], spec: FlagSpec): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const token = eq === -1 ? arg : arg.slice(0, eq);

    const valueFlag = resolveFlag(token, spec.values);
    if (valueFlag !== undefined) {
      const value = eq === -1 ? args[i + 1] : arg.slice(eq + 1);
      if (value === undefined || (eq === -1 && value.startsWith('-'))) {
        throw new ArgumentError(`Option ${token} requires a value`);
      }
      values.set(valueFlag, value);
      if (eq === -1) {
        i++;
      }
      continue;
    }

    const switchFlag = resolveFlag(token, spec.switches);
    if (switchFlag !== undefined && eq === -1) {
      switches.add(switchFlag);
      continue;
    }

    throw new ArgumentError(`Unknown option: ${arg}`);
  }

  return { positionals, values, switches };
}
