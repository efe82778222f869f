#!/usr/bin/env node
/**
 * adr CLI entry point.
 *
 * Creates and updates Architecture Decision Records in a directory of
 * markdown files, keeping a generated README.md index in sync.
 */

import { Command } from "commander";
import { ExitCodes } from "./lib/models.js";
import { formatCliError } from "./lib/errors.js";
import { recordCommand } from "./commands/record.js";
import { initCommand } from "./commands/init.js";
import { indexCommand } from "./commands/index.js";
import { listCommand } from "./commands/list.js";
import { nextCommand } from "./commands/next.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("adr")
  .description("Create and update Architecture Decision Records")
  .version(VERSION, "-V, --version", "output the version number")
  .option("-d, --dir <path>", "record directory (default from .adr.toml, else docs/adr)")
  .option("--root <path>", "project root holding .adr.toml (default: cwd)")
  .option("--json", "output in JSON format")
  .option("-q, --quiet", "suppress non-essential output")
  .option("-v, --verbose", "show detailed output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.quiet && opts.verbose) {
      console.error("Error: --quiet and --verbose are mutually exclusive");
      process.exit(ExitCodes.USAGE_ERROR);
    }
  });

// Register commands; `record` runs when no subcommand is named
program.addCommand(recordCommand, { isDefault: true });
program.addCommand(initCommand);
program.addCommand(indexCommand);
program.addCommand(listCommand);
program.addCommand(nextCommand);

// Parse and execute
program.parseAsync(process.argv).catch((err: unknown) => {
  if (process.env.DEBUG) {
    console.error(err);
  } else {
    console.error(`Error: ${formatCliError(err)}`);
  }
  process.exit(ExitCodes.FAILURE);
});
