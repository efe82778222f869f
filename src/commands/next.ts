/**
 * adr next - Print the number a new record should use.
 */

import { Command } from "commander";
import { ExitCodes } from "../lib/models.js";
import { nextSequenceNumber, resolveStore } from "../lib/storage.js";
import { createReporter, exitWithError, readGlobalOptions } from "../lib/output.js";

export const nextCommand = new Command("next")
  .description("Print the next free record number")
  .action((_options: Record<string, unknown>, command: Command) => {
    const globalOpts = readGlobalOptions(command);
    const reporter = createReporter(globalOpts);

    try {
      const store = resolveStore({ dir: globalOpts.dir, root: globalOpts.root });
      const next = nextSequenceNumber(store.storePath, store.config.number_width);

      reporter.json({ next });
      reporter.result(next);

      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      exitWithError(globalOpts, err);
    }
  });
