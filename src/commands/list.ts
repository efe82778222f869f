/**
 * adr list - List records in the store.
 */

import { Command } from "commander";
import * as path from "node:path";
import { ExitCodes } from "../lib/models.js";
import { nodeFileOps, type StoreFileOps } from "../lib/fileops.js";
import {
  extractDisplayTitle,
  listRecordFiles,
  parseSequenceNumber,
  resolveStore,
} from "../lib/storage.js";
import { parseRecord } from "../lib/parsing.js";
import { AdrError } from "../lib/errors.js";
import { createReporter, exitWithError, readGlobalOptions } from "../lib/output.js";

export interface RecordSummary {
  number: string | null;
  filename: string;
  title: string;
  status: string | null;
}

/**
 * Summarize every record in the store, sorted by filename. The title comes
 * from the record's heading when it has one, else from the filename.
 */
export function summarizeRecords(
  storePath: string,
  io: StoreFileOps = nodeFileOps,
): RecordSummary[] {
  if (!io.exists(storePath)) return [];

  return listRecordFiles(storePath, io)
    .sort()
    .map((filename) => {
      const filePath = path.join(storePath, filename);
      let content: string;
      try {
        content = io.readFile(filePath);
      } catch (err) {
        throw new AdrError("RecordUnreadable", `Cannot read record ${filePath}`, { cause: err });
      }
      const parsed = parseRecord(content);
      return {
        number: parseSequenceNumber(filename)?.digits ?? null,
        filename,
        title: parsed.title ?? extractDisplayTitle(filename),
        status: parsed.status,
      };
    });
}

export const listCommand = new Command("list")
  .description("List decision records")
  .option("-s, --status <status>", "only records with this status (case-insensitive)")
  .action((options: Record<string, unknown>, command: Command) => {
    const globalOpts = readGlobalOptions(command);
    const reporter = createReporter(globalOpts);

    try {
      const store = resolveStore({ dir: globalOpts.dir, root: globalOpts.root });
      let records = summarizeRecords(store.storePath);

      if (typeof options.status === "string") {
        const wanted = options.status.toLowerCase();
        records = records.filter((r) => r.status?.toLowerCase() === wanted);
      }

      reporter.json(records);
      if (records.length === 0) {
        reporter.info("No records found.");
      }
      for (const record of records) {
        reporter.result(
          `${record.number ?? "-"}\t${record.status ?? "-"}\t${record.title}`,
        );
      }

      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      exitWithError(globalOpts, err);
    }
  });
