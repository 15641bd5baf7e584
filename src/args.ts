import { UnitabError } from "./errors";

export interface OptionSpec {
  /** Options that take no value, e.g. `--prune`. */
  flags?: string[];
  /** Options that take one value, as `--name x` or `--name=x`. */
  values?: string[];
}

export interface ParsedArgs {
  positional: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

export function usageError(msg: string): UnitabError {
  return new UnitabError(msg, "USAGE");
}

/** Split a command's arguments into positionals and known options; `--` ends option parsing. */
export function parseArgs(argv: string[], spec: OptionSpec = {}): ParsedArgs {
  const flags = new Set(spec.flags ?? []);
  const valued = new Set(spec.values ?? []);
  const parsed: ParsedArgs = { positional: [], flags: new Set(), values: new Map() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      parsed.positional.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      parsed.positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (flags.has(name)) {
      if (eq !== -1) throw usageError(`option '${name}' takes no value`);
      parsed.flags.add(name);
    } else if (valued.has(name)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined) throw usageError(`option '${name}' needs a value`);
      parsed.values.set(name, value);
    } else {
      throw usageError(`unknown option '${name}'`);
    }
  }

  return parsed;
}

export function positiveInt(raw: string, name: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw usageError(`${name} must be a positive integer, got '${raw}'`);
  }
  return Number(raw);
}
