/**
 * CLI pipeline: parse args -> open files -> report or abort.
 */

import { defaultContext, type ErrorContext, isErrorValue } from "@errtally/core";
import pc from "picocolors";
import { parseArgv } from "./args.js";
import { openFiles } from "./open-files.js";
import { reportOpenFailures } from "./report.js";

export interface CliArgs {
  readonly files: readonly string[];
  readonly strict: boolean;
  readonly help: boolean;
  readonly unknownFlags: readonly string[];
}

export const UNKNOWN_FLAG_TAG = "EFLAG";

export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags, unknown } = parseArgv(argv);

  return {
    files: positionals,
    strict: flags.strict === true,
    help: flags.help === true,
    unknownFlags: unknown,
  };
}

function printHelp(): void {
  console.log(`
  open-files - Open files, reporting every one that fails

  Arguments:
    <file...>      Files to open, in order

  Options:
    -s, --strict   Abort if any file cannot be opened
    -h, --help     Show this help message
    --             Treat every later argument as a file
`);
}

/**
 * Run the CLI. Returns the exit code.
 *
 * @throws {FatalRecordError} on an unknown flag, when no file argument is
 * given, when no file could be opened, or in strict mode when any file failed
 */
export function main(argv: readonly string[], errors: ErrorContext = defaultContext): number {
  const cliArgs = parseArgs(argv);

  if (cliArgs.help) {
    printHelp();
    return 0;
  }

  if (cliArgs.unknownFlags.length > 0) {
    errors.registerTag(UNKNOWN_FLAG_TAG, "Unknown option:[%s]");
    let record = errors.raise();
    for (const flag of cliArgs.unknownFlags) {
      record = errors.raise(record, UNKNOWN_FLAG_TAG, flag);
    }
    errors.abortIfError(record);
  }

  if (cliArgs.files.length === 0) {
    errors.abortIfError(errors.raise(undefined, "EARG", "file"));
  }

  const outcome = openFiles(cliArgs.files, errors);
  let opened = outcome.ok ? outcome.value : [];

  if (isErrorValue(outcome)) {
    opened = outcome.lastPayload() ?? [];
    if (opened.length === 0 || cliArgs.strict) {
      errors.abortIfError(outcome);
    }

    const [warning, ...files] = reportOpenFailures(outcome, errors);
    console.log(pc.yellow(warning ?? ""));
    for (const line of files) {
      console.log(line);
    }
    console.log();
  }

  for (const file of opened) {
    console.log(`  ${pc.green("✓")} ${file.path} ${pc.dim(`(${file.size} bytes)`)}`);
  }

  return 0;
}
