/**
 * Console output shared by all commands.
 *
 * Results go to stdout; diagnostics go to stderr so `--json` output stays
 * parseable. `--quiet` drops informational lines, `--verbose` adds step
 * detail. Set DEBUG=1 to print stack traces for errors.
 */

import type { Command } from "commander";
import { exitCodeFor, formatCliError, isAdrError } from "./errors.js";

/**
 * Options declared on the root program.
 */
export interface GlobalOptions {
  dir?: string;
  root?: string;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Read the root program's options from a subcommand.
 */
export function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.parent?.opts() ?? {};
  return {
    dir: typeof opts.dir === "string" ? opts.dir : undefined,
    root: typeof opts.root === "string" ? opts.root : undefined,
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
  };
}

export interface Reporter {
  /** Primary human-readable result (suppressed under --json) */
  result(line: string): void;
  /** Non-essential information (suppressed by --quiet and --json) */
  info(line: string): void;
  /** Step detail, shown with --verbose only */
  detail(line: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Machine output, printed only under --json */
  json(value: unknown): void;
}

export function createReporter(opts: GlobalOptions): Reporter {
  return {
    result(line) {
      if (!opts.json) console.log(line);
    },
    info(line) {
      if (!opts.json && !opts.quiet) console.log(line);
    },
    detail(line) {
      if (opts.verbose) console.error(line);
    },
    warn(message) {
      console.error(`Warning: ${message}`);
    },
    error(message) {
      console.error(`Error: ${message}`);
    },
    json(value) {
      if (opts.json) console.log(JSON.stringify(value, null, 2));
    },
  };
}

/**
 * Report an error caught at a command boundary and exit with its code.
 */
export function exitWithError(opts: GlobalOptions, err: unknown): never {
  const message = formatCliError(err);

  if (opts.json) {
    console.log(
      JSON.stringify({
        status: "error",
        kind: isAdrError(err) ? err.kind : "Unexpected",
        error: message,
      }),
    );
  } else {
    console.error(`Error: ${message}`);
  }

  if (process.env.DEBUG && err instanceof Error && err.stack) {
    console.error(err.stack);
  }

  process.exit(exitCodeFor(err));
}
