/**
 * Minimal argument parser.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, boolean>>;
  /** Flags outside the known set, as written */
  readonly unknown: readonly string[];
}

const ALIASES: Readonly<Record<string, string>> = {
  s: "strict",
  h: "help",
};

const BOOLEAN_FLAGS = new Set(["strict", "help"]);

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, boolean> = {};
  const unknown: string[] = [];

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      // Everything after -- is a file name, even if it starts with a dash
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--") || (arg.startsWith("-") && arg.length === 2)) {
      const raw = arg.startsWith("--") ? arg.slice(2) : arg.slice(1);
      const key = ALIASES[raw] ?? raw;
      if (BOOLEAN_FLAGS.has(key)) {
        flags[key] = true;
      } else {
        // Unknown flags take no value
        unknown.push(arg);
      }
    } else {
      positionals.push(arg);
    }

    i++;
  }

  return { positionals, flags, unknown };
}
