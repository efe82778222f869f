/**
 * adr record - Create a record or update an existing one.
 *
 * This is the default command: `adr -n 4 -s Accepted -t "Use Postgres"`.
 * A number that matches no file creates a record (title required); a number
 * that exists updates its status and, with --title, renames it.
 *
 * Missing number or status are prompted for when stdin is a terminal.
 */

import { Command } from "commander";
import * as path from "node:path";
import {
  DEFAULT_CONFIG,
  ExitCodes,
  type AdrConfig,
  type RecordOutcome,
  type RecordRequest,
} from "../lib/models.js";
import { AdrError, formatCliError } from "../lib/errors.js";
import {
  nextSequenceNumber,
  normalizeNumber,
  resolveStore,
} from "../lib/storage.js";
import { applyRecord, inspectRecord } from "../lib/lifecycle.js";
import {
  createPrompter,
  formatStatusMenu,
  resolveStatusChoice,
  withDefault,
  type Prompter,
} from "../lib/prompt.js";
import {
  createReporter,
  exitWithError,
  readGlobalOptions,
  type Reporter,
} from "../lib/output.js";

/**
 * Values given on the command line; any of them may be missing.
 */
export interface RecordFlags {
  number?: string;
  status?: string;
  title?: string;
}

/**
 * Fill in missing values by asking. Flags that were given are not asked for.
 * When updating, a blank title answer keeps the current title.
 */
export async function promptForRequest(
  prompter: Prompter,
  storePath: string,
  config: Required<AdrConfig>,
  flags: RecordFlags,
  print: (line: string) => void = console.log,
): Promise<RecordRequest> {
  let number: string;
  if (flags.number !== undefined) {
    number = normalizeNumber(flags.number, config.number_width);
  } else {
    const suggested = nextSequenceNumber(storePath, config.number_width);
    const answer = await prompter.ask(withDefault("Record number", suggested));
    number = normalizeNumber(answer.trim() === "" ? suggested : answer, config.number_width);
  }

  const existing = inspectRecord(storePath, number);
  if (existing) {
    print(`Updating ${existing.filename}`);
  }

  let status = flags.status;
  if (status === undefined) {
    print(formatStatusMenu(config.statuses));
    const current = existing?.parsed.status ?? null;
    const answer = await prompter.ask(withDefault("Status", current));
    status = resolveStatusChoice(answer, config.statuses, current ?? "");
  }
  if (status.trim() === "") {
    throw new AdrError("MissingArgument", `A status is required for record ${number}`);
  }

  let title = flags.title;
  if (title === undefined) {
    const current = existing?.parsed.title ?? null;
    const answer = await prompter.ask(withDefault("Title", current));
    title = answer.trim() === "" ? undefined : answer.trim();
  }

  return { number, status: status.trim(), title };
}

/**
 * Build the request from flags alone. A blank value counts as missing.
 */
export function requestFromFlags(
  flags: RecordFlags,
  numberWidth: number = DEFAULT_CONFIG.number_width,
): RecordRequest {
  const status = flags.status?.trim() ?? "";
  if (flags.number === undefined || flags.number.trim() === "" || status === "") {
    throw new AdrError(
      "MissingArgument",
      "Both --number and --status are required (--title is also required for new records)",
    );
  }
  return {
    number: normalizeNumber(flags.number, numberWidth),
    status,
    title: flags.title,
  };
}

/**
 * One-line human summary of an outcome.
 */
export function describeOutcome(outcome: RecordOutcome, cwd: string = process.cwd()): string {
  const shown = path.relative(cwd, outcome.path) || outcome.path;
  if (outcome.action === "created") {
    return `Created ${shown}`;
  }
  if (outcome.renamed && outcome.previousFilename) {
    return `Updated ${shown} (renamed from ${outcome.previousFilename})`;
  }
  return `Updated ${shown}`;
}

function reportOutcome(reporter: Reporter, outcome: RecordOutcome): void {
  reporter.result(describeOutcome(outcome));

  if (outcome.action === "updated") {
    if (outcome.statusChanged) {
      const was = outcome.previousStatus ? ` (was ${outcome.previousStatus})` : "";
      reporter.info(`Status: ${outcome.status}${was}`);
    } else {
      reporter.info(`Status unchanged: ${outcome.status}`);
    }
  }

  switch (outcome.cleanup.status) {
    case "removed":
      reporter.detail(`Removed ${outcome.cleanup.filename}`);
      break;
    case "failed":
      reporter.warn(
        `Could not remove ${outcome.cleanup.filename}: ${formatCliError(outcome.cleanup.error)}`,
      );
      break;
    case "skipped":
      break;
  }

  if (outcome.index.status === "rebuilt") {
    reporter.detail(`Index rebuilt: ${outcome.index.count} record(s)`);
  } else {
    reporter.error(formatCliError(outcome.index.error));
  }

  reporter.json({
    status: outcome.action,
    number: outcome.number,
    title: outcome.title,
    path: outcome.path,
    record_status: outcome.status,
    previous_status: outcome.previousStatus,
    status_changed: outcome.statusChanged,
    renamed: outcome.renamed,
    previous_filename: outcome.previousFilename,
    cleanup:
      outcome.cleanup.status === "failed"
        ? { status: "failed", error: formatCliError(outcome.cleanup.error) }
        : { status: outcome.cleanup.status },
    index:
      outcome.index.status === "failed"
        ? { status: "failed", error: formatCliError(outcome.index.error) }
        : { status: "rebuilt", count: outcome.index.count },
  });
}

function readFlags(options: Record<string, unknown>): RecordFlags {
  return {
    number: typeof options.number === "string" ? options.number : undefined,
    status: typeof options.status === "string" ? options.status : undefined,
    title: typeof options.title === "string" ? options.title : undefined,
  };
}

export const recordCommand = new Command("record")
  .description("Create a decision record, or update the status/title of an existing one")
  .option("-n, --number <number>", "sequence number (e.g., 001)")
  .option("-s, --status <status>", "decision status (e.g., Proposed, Accepted, Superseded)")
  .option("-t, --title <title>", "record title (required for new records)")
  .option("-i, --interactive", "prompt for values not given as flags")
  .action(async (options: Record<string, unknown>, command: Command) => {
    const globalOpts = readGlobalOptions(command);
    const reporter = createReporter(globalOpts);

    try {
      const store = resolveStore({ dir: globalOpts.dir, root: globalOpts.root });
      const flags = readFlags(options);

      const complete = flags.number !== undefined && flags.status !== undefined;
      const interactive =
        options.interactive === true || (!complete && process.stdin.isTTY === true);

      let request: RecordRequest;
      if (interactive) {
        const prompter = createPrompter();
        try {
          request = await promptForRequest(prompter, store.storePath, store.config, flags);
        } finally {
          prompter.close();
        }
      } else {
        request = requestFromFlags(flags, store.config.number_width);
      }

      const outcome = applyRecord(store.storePath, request, {
        indexTitle: store.config.index_title,
      });
      reportOutcome(reporter, outcome);

      process.exit(
        outcome.index.status === "failed" ? ExitCodes.PARTIAL_FAILURE : ExitCodes.SUCCESS,
      );
    } catch (err) {
      exitWithError(globalOpts, err);
    }
  });
