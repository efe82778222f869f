/**
 * adr index - Regenerate README.md from the records on disk.
 *
 * Every record command already rebuilds the index; this command repairs an
 * index left stale by a failed write or by hand edits.
 */

import { Command } from "commander";
import { ExitCodes } from "../lib/models.js";
import { resolveStore } from "../lib/storage.js";
import { getIndexPath, rebuildIndex } from "../lib/indexing.js";
import { createReporter, exitWithError, readGlobalOptions } from "../lib/output.js";

export const indexCommand = new Command("index")
  .description("Rebuild the record index (README.md)")
  .action((_options: Record<string, unknown>, command: Command) => {
    const globalOpts = readGlobalOptions(command);
    const reporter = createReporter(globalOpts);

    try {
      const store = resolveStore({ dir: globalOpts.dir, root: globalOpts.root });
      const records = rebuildIndex(store.storePath, { title: store.config.index_title });

      reporter.json({
        status: "success",
        path: getIndexPath(store.storePath),
        records: records.length,
      });
      reporter.result(`Indexed ${records.length} record(s) in ${getIndexPath(store.storePath)}`);
      for (const filename of records) {
        reporter.detail(`  ${filename}`);
      }

      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      exitWithError(globalOpts, err);
    }
  });
